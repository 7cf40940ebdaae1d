// Tree view - virtualized, scrollable tree with expand/collapse navigation

import type { CellStyle } from '../buffer.ts';
import { ClippedSurface } from '../clipped-buffer.ts';
import type { KeyPressEvent } from '../events.ts';
import { getLogger } from '../logging.ts';
import { TermscrollConfig, type GuideStyleSetting } from '../config/mod.ts';
import { getUnicodeTier } from '../utils/terminal-detection.ts';
import { ScrollableView, type ItemArea, type RenderItem, type ScrollableViewProps } from './scrollable-view.ts';
import { flattenTree, findParentIndex, setExpandedAll, type FlatEntry, type TreeNode } from './utils/flattened-view.ts';
import { keyToTreeAction } from './utils/navigation.ts';
import type { MeasureHeight } from './utils/viewport-calculator.ts';
import { splitLines, textWidth } from './utils/text.ts';

const logger = getLogger('TreeView');

export type GuideStyle = GuideStyleSetting;

// ===== Guide Characters =====

interface GuideChars {
  pipe: string;
  tee: string;
  elbow: string;
  dash: string;
}

const GUIDE_CHARS: Record<Exclude<GuideStyle, 'none'>, GuideChars> = {
  unicode: { pipe: '│', tee: '├', elbow: '└', dash: '─' },
  bold: { pipe: '┃', tee: '┣', elbow: '┗', dash: '━' },
  double: { pipe: '║', tee: '╠', elbow: '╚', dash: '═' },
  ascii: { pipe: '|', tee: '+', elbow: '`', dash: '-' },
};

const ICON_EXPANDED = '▼ ';
const ICON_COLLAPSED = '▶ ';
const ICON_EXPANDED_ASCII = 'v ';
const ICON_COLLAPSED_ASCII = '> ';

const GUIDE_STYLE: CellStyle = { dim: true };

export interface TreeViewProps<T> extends ScrollableViewProps {
  roots?: TreeNode<T>[];
  /** Rows per node at the width left after its guide prefix. Defaults to the label's line count */
  measureHeight?: MeasureHeight<TreeNode<T>>;
  guideStyle?: GuideStyle;
  /** Columns per depth level (at least 1) */
  indentWidth?: number;
  /** Drawn in the indicator column of leaves. Defaults to blanks */
  leafIndicator?: string;
  onExpand?: (node: TreeNode<T>) => void;
  onCollapse?: (node: TreeNode<T>) => void;
}

export class TreeView<T> extends ScrollableView<FlatEntry<T>> {
  private _roots: TreeNode<T>[];
  private _measureHeight?: MeasureHeight<TreeNode<T>>;
  private _guideStyle: GuideStyle;
  private _indentWidth: number;
  private _leafIndicator?: string;
  private _onExpand?: (node: TreeNode<T>) => void;
  private _onCollapse?: (node: TreeNode<T>) => void;

  /** Follows the selection (auto-scroll) unless another policy is chosen */
  constructor(props: TreeViewProps<T> = {}) {
    super(props, 'auto-scroll');
    const config = TermscrollConfig.get();
    this._roots = props.roots ?? [];
    this._measureHeight = props.measureHeight;
    this._guideStyle = props.guideStyle ?? config.treeGuideStyle;
    this._indentWidth = Math.max(1, Math.floor(props.indentWidth ?? config.treeIndentWidth));
    this._leafIndicator = props.leafIndicator;
    this._onExpand = props.onExpand;
    this._onCollapse = props.onCollapse;
  }

  get roots(): TreeNode<T>[] {
    return this._roots;
  }

  setRoots(roots: TreeNode<T>[]): void {
    this._roots = roots;
  }

  setGuideStyle(style: GuideStyle): void {
    this._guideStyle = style;
  }

  setIndentWidth(width: number): void {
    this._indentWidth = Math.max(1, Math.floor(width));
  }

  /** The currently visible nodes in display order */
  flatten(): FlatEntry<T>[] {
    return flattenTree(this._roots);
  }

  /**
   * Node at the stored selection, clamped into the current flattening
   * (an ancestor of the selection may have collapsed since it was set).
   */
  selectedNode(): TreeNode<T> | undefined {
    const entries = this.flatten();
    if (entries.length === 0) return undefined;
    return entries[this._selection.clampTo(entries.length)].node;
  }

  // ===== Expand / collapse =====

  /**
   * Expand the selected node, or step into its first child when it is
   * already expanded. No-op on leaves.
   */
  expand(): void {
    const entries = this.flatten();
    if (entries.length === 0) return;
    const index = this._selection.clampTo(entries.length);
    const node = entries[index].node;
    if (node.isLeaf) return;

    if (node.isExpanded) {
      this.select(index + 1);
      return;
    }
    node.isExpanded = true;
    logger.debug('Expanded node', { id: this.id, label: node.label });
    this._onExpand?.(node);
  }

  /**
   * Collapse the selected node, or move to its parent when it is a leaf or
   * already collapsed.
   */
  collapse(): void {
    const entries = this.flatten();
    if (entries.length === 0) return;
    const index = this._selection.clampTo(entries.length);
    const node = entries[index].node;

    if (!node.isLeaf && node.isExpanded) {
      node.isExpanded = false;
      logger.debug('Collapsed node', { id: this.id, label: node.label });
      this._onCollapse?.(node);
      return;
    }

    const parentIndex = findParentIndex(entries, index);
    if (parentIndex >= 0) {
      this.select(parentIndex);
    }
  }

  /** Flip the selected node's expansion. No-op on leaves. */
  toggle(): void {
    const node = this.selectedNode();
    if (!node?.toggle()) return;
    logger.debug('Toggled node', { id: this.id, label: node.label, expanded: node.isExpanded });
    if (node.isExpanded) {
      this._onExpand?.(node);
    } else {
      this._onCollapse?.(node);
    }
  }

  expandAll(): void {
    setExpandedAll(this._roots, true);
  }

  collapseAll(): void {
    setExpandedAll(this._roots, false);
    this._selection.clampTo(this.flatten().length);
  }

  protected override _handleExtraKey(event: KeyPressEvent): boolean {
    switch (keyToTreeAction(event)) {
      case 'expand':
        this.expand();
        return true;
      case 'collapse':
        this.collapse();
        return true;
      case 'toggle':
        this.toggle();
        return true;
      default:
        return false;
    }
  }

  // ===== Prefix =====

  private _guideChars(): GuideChars | null {
    const style = this._guideStyle;
    if (style === 'none') return null;
    const tier = getUnicodeTier();
    if (tier === 'ascii') return GUIDE_CHARS.ascii;
    if (tier === 'basic' && style === 'bold') return GUIDE_CHARS.unicode;
    return GUIDE_CHARS[style];
  }

  private _indicator(entry: FlatEntry<T>): string {
    const ascii = getUnicodeTier() === 'ascii';
    if (entry.node.isLeaf) {
      return this._leafIndicator ?? ' '.repeat(textWidth(ICON_EXPANDED));
    }
    if (entry.node.isExpanded) {
      return ascii ? ICON_EXPANDED_ASCII : ICON_EXPANDED;
    }
    return ascii ? ICON_COLLAPSED_ASCII : ICON_COLLAPSED;
  }

  /** Columns taken by guides and the indicator */
  prefixWidth(entry: FlatEntry<T>): number {
    return entry.depth * this._indentWidth + textWidth(this._indicator(entry));
  }

  /**
   * Guide prefix for one row of an entry. The first row carries the
   * connector and indicator; continuation rows only continue the lines.
   */
  private _prefix(entry: FlatEntry<T>, firstRow: boolean): string {
    const chars = this._guideChars();
    const indent = this._indentWidth;
    let prefix = '';

    for (let level = 1; level <= entry.depth; level++) {
      const own = level === entry.depth;
      if (!chars) {
        prefix += ' '.repeat(indent);
      } else if (own && firstRow) {
        prefix += (entry.isLast ? chars.elbow : chars.tee) + chars.dash.repeat(indent - 1);
      } else {
        const lastAtLevel = own ? entry.isLast : entry.ancestorIsLast[level];
        prefix += (lastAtLevel ? ' ' : chars.pipe) + ' '.repeat(indent - 1);
      }
    }

    const indicator = this._indicator(entry);
    return prefix + (firstRow ? indicator : ' '.repeat(textWidth(indicator)));
  }

  // ===== ScrollableView hooks =====

  protected _entries(): readonly FlatEntry<T>[] {
    return this.flatten();
  }

  protected _measure(entry: FlatEntry<T>, width: number): number {
    const available = Math.max(1, width - this.prefixWidth(entry));
    return this._measureHeight
      ? this._measureHeight(entry.node, available)
      : splitLines(entry.node.label).length;
  }

  protected _naturalWidth(entry: FlatEntry<T>): number {
    return this.prefixWidth(entry) + Math.max(0, ...splitLines(entry.node.label).map(textWidth));
  }

  protected override _renderEntry(entry: FlatEntry<T>, area: ItemArea, renderItem?: RenderItem<FlatEntry<T>>): void {
    const guideStyle = area.selected ? area.highlightStyle : GUIDE_STYLE;
    for (let row = 0; row < area.height; row++) {
      area.surface.setText(area.x, area.y + row, this._prefix(entry, area.skipRows + row === 0), guideStyle);
    }

    const prefixWidth = this.prefixWidth(entry);
    const width = area.width - prefixWidth;
    if (width <= 0) return;

    const bounds = { x: area.x + prefixWidth, y: area.y, width, height: area.height };
    super._renderEntry(entry, { ...area, ...bounds, surface: new ClippedSurface(area.surface, bounds) }, renderItem);
  }

  protected _renderDefault(entry: FlatEntry<T>, area: ItemArea): void {
    const lines = splitLines(entry.node.label);
    const style = area.selected ? area.highlightStyle : {};
    for (let row = 0; row < area.height; row++) {
      const line = lines[area.skipRows + row];
      if (line !== undefined) {
        area.surface.setText(area.x, area.y + row, line, style);
      }
    }
  }
}
