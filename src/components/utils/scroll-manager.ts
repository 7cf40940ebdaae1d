// Shared scroll state management for scrollable views

/**
 * Read-only view of a ScrollManager, as handed out to callers.
 */
export interface ScrollState {
  readonly offset: number;
  readonly viewportHeight: number;
  readonly contentHeight: number;
  readonly maxScroll: number;
  readonly userScrolledAway: boolean;
}

/**
 * Vertical scroll state for a virtualized view: the offset of the first
 * visible row, the viewport and content heights in rows, and the sticky
 * "user scrolled away" flag.
 *
 * Every mutator leaves `0 <= offset <= maxScroll`.
 */
export class ScrollManager {
  /** First visible content row */
  offset = 0;
  /** Rows available for content */
  viewportHeight = 0;
  /** Total rows of all items */
  contentHeight = 0;
  /** Sticky scroll only: set when the user navigates away from the bottom */
  userScrolledAway = false;

  /** Maximum valid scroll position */
  get maxScroll(): number {
    return Math.max(0, this.contentHeight - this.viewportHeight);
  }

  /** Whether content exceeds viewport (scrollbar needed) */
  get needsScrollbar(): boolean {
    return this.contentHeight > this.viewportHeight;
  }

  get isAtBottom(): boolean {
    return this.offset >= this.maxScroll;
  }

  /** Clamp offset to valid range */
  clamp(): void {
    if (!Number.isFinite(this.offset)) this.offset = 0;
    this.offset = Math.max(0, Math.min(Math.floor(this.offset), this.maxScroll));
  }

  /**
   * Update content and viewport heights, then clamp.
   */
  update(contentHeight: number, viewportHeight: number): void {
    this.contentHeight = Math.max(0, contentHeight);
    this.viewportHeight = Math.max(0, viewportHeight);
    this.clamp();
  }

  scrollBy(delta: number): void {
    this.offset += delta;
    this.clamp();
  }

  setOffset(offset: number): void {
    this.offset = offset;
    this.clamp();
  }

  scrollToTop(): void {
    this.offset = 0;
  }

  scrollToEnd(): void {
    this.offset = this.maxScroll;
  }

  /**
   * Move the offset the least distance that brings rows [startLine, endLine)
   * into the viewport. For single-line rows, pass the row index only.
   * A range taller than the viewport is aligned to its first row.
   */
  ensureVisible(startLine: number, endLine?: number): void {
    const end = endLine ?? startLine + 1;
    if (startLine < this.offset) {
      this.offset = startLine;
    } else if (end > this.offset + this.viewportHeight) {
      this.offset = Math.min(startLine, end - this.viewportHeight);
    }
    this.clamp();
  }

  /**
   * Handle mouse wheel scroll. Returns true if scroll position changed.
   */
  handleWheel(deltaY: number): boolean {
    if (!this.needsScrollbar) return false;
    const old = this.offset;
    this.scrollBy(deltaY);
    return this.offset !== old;
  }

  /**
   * Scroll to a position based on a ratio (0-1), e.g., from scrollbar click.
   */
  scrollToRatio(ratio: number): void {
    const r = Math.max(0, Math.min(1, ratio));
    this.offset = Math.floor(r * this.maxScroll);
    this.clamp();
  }

  /** Get the visible row range [start, end) */
  getVisibleRange(): { start: number; end: number } {
    const start = this.offset;
    const end = Math.min(start + this.viewportHeight, this.contentHeight);
    return { start, end: Math.max(start, end) };
  }

  snapshot(): ScrollState {
    return {
      offset: this.offset,
      viewportHeight: this.viewportHeight,
      contentHeight: this.contentHeight,
      maxScroll: this.maxScroll,
      userScrolledAway: this.userScrolledAway,
    };
  }
}
