// Virtualization: which items intersect the viewport, and how much of each

/**
 * Height oracle: rows an item occupies when rendered at the given width.
 */
export type MeasureHeight<T> = (item: T, availableWidth: number) => number;

export interface VisibleItem {
  /** Index into the item sequence */
  index: number;
  /** Leading rows of the item hidden above the viewport */
  skipRows: number;
  /** Rows of the item inside the viewport */
  rows: number;
  /** Viewport row where the visible part starts */
  y: number;
}

export interface VisibleWindow {
  /** First visible index, -1 when nothing is visible */
  firstIndex: number;
  /** Rows of the first item hidden above the viewport */
  skipRows: number;
  items: VisibleItem[];
}

/**
 * Compute the visible slice of items with the given heights.
 *
 * Items ending at or before `offset` are skipped, the first straddling
 * item is clipped at the top, and the last one at the bottom. A
 * non-positive viewport, an offset at or past the total height, or an
 * empty sequence yield an empty window.
 */
export function computeVisibleWindow(
  heights: readonly number[],
  offset: number,
  viewportHeight: number
): VisibleWindow {
  if (heights.length === 0 || viewportHeight <= 0) {
    return { firstIndex: -1, skipRows: 0, items: [] };
  }

  const top = Math.max(0, Math.floor(offset));
  const items: VisibleItem[] = [];
  let cumStart = 0;
  let y = 0;

  for (let i = 0; i < heights.length && y < viewportHeight; i++) {
    const h = heights[i];
    const cumEnd = cumStart + h;

    if (cumEnd > top) {
      const skip = Math.max(0, top - cumStart);
      const rows = Math.min(h - skip, viewportHeight - y);
      items.push({ index: i, skipRows: skip, rows, y });
      y += rows;
    }

    cumStart = cumEnd;
  }

  if (items.length === 0) {
    return { firstIndex: -1, skipRows: 0, items };
  }
  return { firstIndex: items[0].index, skipRows: items[0].skipRows, items };
}

/**
 * Measure every item at `width` (floored at 1). Heights are integers >= 1.
 */
export function measureHeights<T>(
  items: readonly T[],
  measure: MeasureHeight<T>,
  width: number
): number[] {
  const w = Math.max(1, Math.floor(width));
  return items.map((item) => {
    const h = measure(item, w);
    return Number.isFinite(h) ? Math.max(1, Math.floor(h)) : 1;
  });
}

export function totalHeight(heights: readonly number[]): number {
  let total = 0;
  for (const h of heights) total += h;
  return total;
}

/**
 * Row range [start, end) occupied by the item at `index`.
 */
export function itemExtent(heights: readonly number[], index: number): { start: number; end: number } {
  let start = 0;
  for (let i = 0; i < index && i < heights.length; i++) {
    start += heights[i];
  }
  return { start, end: start + (heights[index] ?? 1) };
}

/**
 * Item index at a content row, or -1 past the end.
 */
export function indexAtRow(heights: readonly number[], row: number): number {
  if (row < 0) return -1;
  let start = 0;
  for (let i = 0; i < heights.length; i++) {
    start += heights[i];
    if (row < start) return i;
  }
  return -1;
}
