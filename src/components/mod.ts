// Component module exports

export * from './scrollable-view.ts';
export * from './list.ts';
export * from './tree.ts';
export * from './scrollbar.ts';

// Engine building blocks
export * from './utils/scroll-manager.ts';
export * from './utils/selection-state.ts';
export * from './utils/scroll-policy.ts';
export * from './utils/viewport-calculator.ts';
export * from './utils/navigation.ts';
export * from './utils/flattened-view.ts';
export * from './utils/text.ts';
