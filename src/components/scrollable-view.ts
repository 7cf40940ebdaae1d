// Shared render pipeline and input handling for list and tree views

import type { Bounds, BorderStyle } from '../types.ts';
import { getBorderChars } from '../types.ts';
import type { CellStyle, RenderSurface } from '../buffer.ts';
import { ClippedSurface } from '../clipped-buffer.ts';
import type { KeyPressEvent, TermscrollEvent } from '../events.ts';
import { insetBounds, pointInBounds } from '../geometry.ts';
import { getLogger } from '../logging.ts';
import { TermscrollConfig } from '../config/mod.ts';
import { createThemeStyleResolver, resolveStyle, type StyleResolver } from '../style-resolver.ts';
import { getUnicodeTier } from '../utils/terminal-detection.ts';
import { ScrollManager, type ScrollState } from './utils/scroll-manager.ts';
import { SelectionState } from './utils/selection-state.ts';
import { ScrollPolicyController, resolveScrollPolicy, type ScrollPolicy } from './utils/scroll-policy.ts';
import {
  computeVisibleWindow,
  itemExtent,
  measureHeights,
  totalHeight,
  type VisibleWindow,
} from './utils/viewport-calculator.ts';
import { applyNavigation, keyToNavigationAction, type NavigationAction } from './utils/navigation.ts';
import { textWidth, truncateText } from './utils/text.ts';
import {
  layoutWithScrollbar,
  projectScrollbar,
  renderScrollbar,
  scrollRatioAt,
  type ScrollbarPolicy,
} from './scrollbar.ts';

const logger = getLogger('ScrollableView');

/**
 * Rectangle handed to an item renderer. `surface` is clipped to it.
 */
export interface ItemArea {
  x: number;
  y: number;
  width: number;
  /** Visible rows of the item */
  height: number;
  index: number;
  /** Leading rows of the item scrolled out above the viewport */
  skipRows: number;
  selected: boolean;
  /** Resolved highlight style; apply it when `selected` */
  highlightStyle: CellStyle;
  surface: RenderSurface;
}

export type RenderItem<E> = (entry: E, area: ItemArea) => void;

export interface ScrollableViewProps {
  id?: string;
  scrollPolicy?: ScrollPolicy;
  /** Drawn before the selected item; its width is reserved on every row. Default from config ("> ") */
  highlightSymbol?: string;
  highlightStyle?: CellStyle;
  /** Draw the symbol on every visible row of a multi-row selection, not just the first */
  repeatHighlightSymbol?: boolean;
  scrollbar?: ScrollbarPolicy;
  scrollbarThumbStyle?: CellStyle;
  scrollbarTrackStyle?: CellStyle;
  border?: BorderStyle;
  borderCellStyle?: CellStyle;
  title?: string;
  styleResolver?: StyleResolver;
  /** Rows (or items) per wheel notch. Default from config (3) */
  wheelStep?: number;
}

interface RenderLayout {
  inner: Bounds;
  contentWidth: number;
  gutter: number;
  heights: number[];
  window: VisibleWindow;
  scrollbarX: number | null;
}

export abstract class ScrollableView<E> {
  protected readonly _scroll = new ScrollManager();
  protected readonly _selection = new SelectionState();
  private readonly _policy: ScrollPolicyController;

  readonly id: string;
  private _highlightSymbol: string;
  private _highlightStyle?: CellStyle;
  private _repeatHighlightSymbol: boolean;
  private _scrollbarPolicy: ScrollbarPolicy;
  private _scrollbarThumbStyle?: CellStyle;
  private _scrollbarTrackStyle?: CellStyle;
  private _border: BorderStyle;
  private _borderCellStyle?: CellStyle;
  private _title?: string;
  private _styleResolver?: StyleResolver;
  private _wheelStep: number;

  private _lastLayout: RenderLayout | null = null;

  /**
   * `defaultPolicy` applies until a policy is chosen through props or a
   * setter; that choice replaces it without a conflict.
   */
  constructor(props: ScrollableViewProps = {}, defaultPolicy: ScrollPolicy = 'none') {
    const config = TermscrollConfig.get();
    this.id = props.id ?? this.constructor.name;
    this._policy = new ScrollPolicyController(this.id, defaultPolicy);
    this._highlightSymbol = props.highlightSymbol ?? config.highlightSymbol;
    this._highlightStyle = props.highlightStyle;
    this._repeatHighlightSymbol = props.repeatHighlightSymbol ?? false;
    this._scrollbarPolicy = props.scrollbar ?? config.scrollbarPolicy;
    this._scrollbarThumbStyle = props.scrollbarThumbStyle;
    this._scrollbarTrackStyle = props.scrollbarTrackStyle;
    this._border = props.border ?? 'none';
    this._borderCellStyle = props.borderCellStyle;
    this._title = props.title;
    this._styleResolver = props.styleResolver;
    this._wheelStep = Math.max(1, props.wheelStep ?? config.wheelStep);

    if (props.scrollPolicy) {
      this.setScrollPolicy(props.scrollPolicy);
    }
  }

  // ===== Subclass hooks =====

  /** Current linear sequence; rebuilt on every call */
  protected abstract _entries(): readonly E[];

  /** Rows the entry occupies at `width` content columns */
  protected abstract _measure(entry: E, width: number): number;

  /** Columns the entry needs unwrapped, excluding the highlight gutter */
  protected abstract _naturalWidth(entry: E): number;

  /** Draw an entry when the caller supplies no renderer */
  protected abstract _renderDefault(entry: E, area: ItemArea): void;

  protected _renderEntry(entry: E, area: ItemArea, renderItem?: RenderItem<E>): void {
    if (renderItem) {
      renderItem(entry, area);
    } else {
      this._renderDefault(entry, area);
    }
  }

  /** Keys beyond the shared navigation set (tree expand/collapse) */
  protected _handleExtraKey(_event: KeyPressEvent): boolean {
    return false;
  }

  // ===== Configuration =====

  get scrollPolicy(): ScrollPolicy {
    return this._policy.policy;
  }

  /**
   * Select the follow policy. Throws ConfigurationError when a different
   * follow policy was already chosen; 'none' always succeeds.
   */
  setScrollPolicy(policy: ScrollPolicy): void {
    if (this._policy.set(policy) && policy === 'sticky-scroll') {
      this._scroll.userScrolledAway = false;
    }
  }

  enableAutoScroll(): void {
    this.setScrollPolicy('auto-scroll');
  }

  enableScrollToEnd(): void {
    this.setScrollPolicy('scroll-to-end');
  }

  enableStickyScroll(): void {
    this.setScrollPolicy('sticky-scroll');
  }

  get highlightSymbol(): string {
    return this._highlightSymbol;
  }

  setHighlightSymbol(symbol: string): void {
    this._highlightSymbol = symbol;
  }

  setHighlightStyle(style: CellStyle | undefined): void {
    this._highlightStyle = style;
  }

  setRepeatHighlightSymbol(repeat: boolean): void {
    this._repeatHighlightSymbol = repeat;
  }

  get scrollbarPolicy(): ScrollbarPolicy {
    return this._scrollbarPolicy;
  }

  setScrollbarPolicy(policy: ScrollbarPolicy): void {
    this._scrollbarPolicy = policy;
  }

  setScrollbarStyles(thumb: CellStyle | undefined, track: CellStyle | undefined): void {
    this._scrollbarThumbStyle = thumb;
    this._scrollbarTrackStyle = track;
  }

  setBorder(border: BorderStyle, title?: string): void {
    this._border = border;
    this._title = title;
  }

  setBorderCellStyle(style: CellStyle | undefined): void {
    this._borderCellStyle = style;
  }

  setStyleResolver(resolver: StyleResolver | undefined): void {
    this._styleResolver = resolver;
  }

  setWheelStep(step: number): void {
    this._wheelStep = Math.max(1, Math.floor(step));
  }

  // ===== State =====

  get selectedIndex(): number {
    return this._selection.clampTo(this._entries().length);
  }

  getScrollState(): ScrollState {
    return this._scroll.snapshot();
  }

  getLastVisibleWindow(): VisibleWindow | null {
    return this._lastLayout?.window ?? null;
  }

  // ===== Navigation =====

  /**
   * Run a navigation action. Under sticky-scroll it moves the offset, under
   * other policies the selection.
   */
  navigate(action: NavigationAction): void {
    const result = applyNavigation(action, {
      policy: this._policy.policy,
      scroll: this._scroll,
      selection: this._selection,
      itemCount: this._entries().length,
    });
    if (result === 'selection') {
      this._afterSelectionChange();
    }
  }

  selectPrevious(): void {
    this.navigate('move-up');
  }

  selectNext(): void {
    this.navigate('move-down');
  }

  selectFirst(): void {
    this.navigate('home');
  }

  selectLast(): void {
    this.navigate('end');
  }

  pageUp(): void {
    this.navigate('page-up');
  }

  pageDown(): void {
    this.navigate('page-down');
  }

  /** Select an index directly (clamped) */
  select(index: number): void {
    this._selection.select(index, this._entries().length);
    this._afterSelectionChange();
  }

  scrollBy(delta: number): void {
    this._scroll.scrollBy(delta);
    this._markScrolledAway(delta !== 0);
  }

  scrollToTop(): void {
    this._scroll.scrollToTop();
    this._markScrolledAway(true);
  }

  scrollToEnd(): void {
    this._scroll.scrollToEnd();
    if (this._policy.policy === 'sticky-scroll') {
      this._scroll.userScrolledAway = false;
    }
  }

  private _markScrolledAway(moved: boolean): void {
    if (moved && this._policy.policy === 'sticky-scroll') {
      this._scroll.userScrolledAway = true;
    }
  }

  /**
   * Under auto-scroll, bring the new selection into view right away using
   * heights measured at the last rendered width. Before the first render
   * there is no viewport yet and the next render does it.
   */
  protected _afterSelectionChange(): void {
    const layout = this._lastLayout;
    if (this._policy.policy !== 'auto-scroll' || !layout) return;

    const entries = this._entries();
    const heights = measureHeights(entries, (entry, w) => this._measure(entry, w), layout.contentWidth - layout.gutter);
    this._scroll.update(totalHeight(heights), layout.inner.height);
    if (entries.length > 0) {
      const extent = itemExtent(heights, this._selection.clampTo(entries.length));
      this._scroll.ensureVisible(extent.start, extent.end);
    }
  }

  // ===== Input =====

  /**
   * Route an input event to the matching handler. Events aimed at another
   * view, clicks other than the left button, and wheel events outside the
   * last rendered content area are ignored. Returns true if state changed.
   */
  handleEvent(event: TermscrollEvent): boolean {
    if (event.target !== undefined && event.target !== this.id) return false;

    switch (event.type) {
      case 'keypress':
        return this.onKeyPress(event);
      case 'click':
        return event.button === 0 && this.handleClick(event.x, event.y);
      case 'wheel': {
        const layout = this._lastLayout;
        if (layout && !pointInBounds(event.x, event.y, layout.inner)) return false;
        return this.handleWheel(event.deltaY);
      }
    }
  }

  onKeyPress(event: KeyPressEvent): boolean {
    const action = keyToNavigationAction(event);
    if (action) {
      this.navigate(action);
      return true;
    }
    return this._handleExtraKey(event);
  }

  /**
   * Mouse wheel. With no follow policy or under sticky-scroll it scrolls the
   * viewport; otherwise it moves the selection. `deltaY` gives the
   * direction; the distance is the wheel step. Returns true if state changed.
   */
  handleWheel(deltaY: number): boolean {
    if (deltaY === 0) return false;
    const delta = Math.sign(deltaY) * this._wheelStep;
    const policy = this._policy.policy;

    if (policy === 'none' || policy === 'sticky-scroll') {
      const changed = this._scroll.handleWheel(delta);
      this._markScrolledAway(changed);
      return changed;
    }

    const count = this._entries().length;
    const before = this._selection.clampTo(count);
    const after = this._selection.moveBy(delta, count);
    if (after !== before) {
      this._afterSelectionChange();
    }
    return after !== before;
  }

  /**
   * Click at absolute coordinates from the last render: the scrollbar jumps
   * proportionally, an item row selects that item.
   */
  handleClick(x: number, y: number): boolean {
    const layout = this._lastLayout;
    if (!layout || !pointInBounds(x, y, layout.inner)) return false;

    const row = y - layout.inner.y;
    if (layout.scrollbarX !== null && x === layout.scrollbarX) {
      this._scroll.scrollToRatio(scrollRatioAt(row, layout.inner.height));
      this._markScrolledAway(true);
      return true;
    }

    const hit = layout.window.items.find((item) => row >= item.y && row < item.y + item.rows);
    if (!hit) return false;
    this.select(hit.index);
    return true;
  }

  // ===== Preferred size =====

  /**
   * Columns that show every visible entry unwrapped: the highlight symbol,
   * the widest entry, an 'always' scrollbar and the border. 0 when empty.
   */
  preferredWidth(): number {
    const entries = this._entries();
    if (entries.length === 0) return 0;

    let widest = 0;
    for (const entry of entries) {
      widest = Math.max(widest, this._naturalWidth(entry));
    }
    return textWidth(this._highlightSymbol) + widest + this._chromeWidth();
  }

  /**
   * Rows that show every visible entry when laid out `width` columns wide
   * (border included), plus the border. 0 when empty.
   */
  preferredHeight(width = this.preferredWidth()): number {
    const entries = this._entries();
    if (entries.length === 0) return 0;

    const contentWidth = width - this._chromeWidth() - textWidth(this._highlightSymbol);
    const heights = measureHeights(entries, (entry, w) => this._measure(entry, w), contentWidth);
    return totalHeight(heights) + (this._border === 'none' ? 0 : 2);
  }

  private _chromeWidth(): number {
    return (this._border === 'none' ? 0 : 2) + (this._scrollbarPolicy === 'always' ? 1 : 0);
  }

  // ===== Rendering =====

  /**
   * Lay out border, visible items and scrollbar inside `area`, and update
   * scroll state for the next frame. Degenerate areas render nothing.
   */
  render(area: Bounds, surface: RenderSurface, renderItem?: RenderItem<E>): void {
    const resolver = this._styleResolver ?? createThemeStyleResolver();

    let inner = area;
    if (this._border !== 'none' && area.width >= 2 && area.height >= 2) {
      this._drawBorder(area, surface, resolveStyle('border', this._borderCellStyle, resolver));
      inner = insetBounds(area, 1);
    }

    const entries = this._entries();
    const count = entries.length;
    const selected = this._selection.clampTo(count);

    if (inner.width <= 0 || inner.height <= 0) {
      logger.trace('Nothing visible: degenerate area', { id: this.id, width: inner.width, height: inner.height });
      this._scroll.update(this._scroll.contentHeight, 0);
      this._lastLayout = null;
      return;
    }

    const gutter = textWidth(this._highlightSymbol);
    const layout = layoutWithScrollbar(
      this._scrollbarPolicy,
      count,
      inner.width,
      inner.height,
      (contentWidth) => measureHeights(entries, (entry, w) => this._measure(entry, w), contentWidth - gutter)
    );
    const heights = layout.heights;

    this._scroll.update(totalHeight(heights), inner.height);
    resolveScrollPolicy(this._policy.policy, this._scroll, count > 0 ? itemExtent(heights, selected) : undefined);

    const window = computeVisibleWindow(heights, this._scroll.offset, inner.height);
    const highlightStyle = resolveStyle('highlight', this._highlightStyle, resolver);
    const itemWidth = Math.max(0, layout.contentWidth - gutter);

    for (const visible of window.items) {
      const isSelected = visible.index === selected;
      const rowY = inner.y + visible.y;

      if (isSelected) {
        surface.fillRect(inner.x, rowY, layout.contentWidth, visible.rows, { ...highlightStyle, char: ' ' });
        if (gutter > 0) {
          const symbolRows = this._repeatHighlightSymbol ? visible.rows : 1;
          for (let r = 0; r < symbolRows; r++) {
            surface.setText(inner.x, rowY + r, truncateText(this._highlightSymbol, layout.contentWidth), highlightStyle);
          }
        }
      }

      if (itemWidth === 0) continue;
      const bounds = { x: inner.x + gutter, y: rowY, width: itemWidth, height: visible.rows };
      this._renderEntry(entries[visible.index], {
        ...bounds,
        index: visible.index,
        skipRows: visible.skipRows,
        selected: isSelected,
        highlightStyle,
        surface: new ClippedSurface(surface, bounds),
      }, renderItem);
    }

    let scrollbarX: number | null = null;
    if (layout.visible) {
      scrollbarX = inner.x + inner.width - 1;
      renderScrollbar(surface, scrollbarX, inner.y, inner.height, {
        metrics: projectScrollbar(this._scroll.contentHeight, inner.height, this._scroll.offset),
        thumbStyle: resolveStyle('scrollbar-thumb', this._scrollbarThumbStyle, resolver),
        trackStyle: resolveStyle('scrollbar-track', this._scrollbarTrackStyle, resolver),
      });
    }

    this._lastLayout = { inner, contentWidth: layout.contentWidth, gutter, heights, window, scrollbarX };
  }

  private _drawBorder(area: Bounds, surface: RenderSurface, style: CellStyle): void {
    const border = this._border;
    if (border === 'none') return;
    const chars = getBorderChars(border, getUnicodeTier());
    const right = area.x + area.width - 1;
    const bottom = area.y + area.height - 1;

    for (let x = area.x + 1; x < right; x++) {
      surface.setCell(x, area.y, { ...style, char: chars.h });
      surface.setCell(x, bottom, { ...style, char: chars.h });
    }
    for (let y = area.y + 1; y < bottom; y++) {
      surface.setCell(area.x, y, { ...style, char: chars.v });
      surface.setCell(right, y, { ...style, char: chars.v });
    }
    surface.setCell(area.x, area.y, { ...style, char: chars.tl });
    surface.setCell(right, area.y, { ...style, char: chars.tr });
    surface.setCell(area.x, bottom, { ...style, char: chars.bl });
    surface.setCell(right, bottom, { ...style, char: chars.br });

    if (this._title && area.width > 2) {
      surface.setText(area.x + 1, area.y, truncateText(this._title, area.width - 2), style);
    }
  }
}
