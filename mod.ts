// termscroll library entry point
// Import this for library usage: import { ... } from './mod.ts'

// Export all types
export * from './src/types.ts';
export * from './src/geometry.ts';

// Export buffer system
export * from './src/buffer.ts';
export * from './src/clipped-buffer.ts';

// Export events
export * from './src/events.ts';

// Export list and tree views
export * from './src/components/mod.ts';

// Export theme and style resolution
export * from './src/theme.ts';
export * from './src/style-resolver.ts';

// Export configuration, logging and environment
export * from './src/config/mod.ts';
export * from './src/logging.ts';
export { Env } from './src/env.ts';
export * from './src/utils/error.ts';
export * from './src/utils/terminal-detection.ts';
