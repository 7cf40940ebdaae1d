/**
 * Scrollbar projection and rendering shared by list and tree views
 */

import type { CellStyle, RenderSurface } from '../buffer.ts';
import { isUnicodeSupported } from '../utils/terminal-detection.ts';

export type ScrollbarPolicy = 'never' | 'always' | 'as-needed';

export interface ScrollbarMetrics {
  thumbPosition: number;
  thumbSize: number;
  /** False when the content fits and there is nothing to scroll */
  scrollable: boolean;
}

/**
 * Thumb metrics for a track of `trackLength` cells.
 *
 * The thumb is proportional to viewportLength / contentLength (at least one
 * cell). When the content fits the viewport the thumb fills the whole track;
 * `as-needed` hides such a scrollbar, so only `always` shows it.
 */
export function projectScrollbar(
  contentLength: number,
  viewportLength: number,
  position: number,
  trackLength: number = viewportLength
): ScrollbarMetrics {
  const track = Math.max(0, Math.floor(trackLength));
  if (track === 0) {
    return { thumbPosition: 0, thumbSize: 0, scrollable: false };
  }
  if (contentLength <= viewportLength || viewportLength <= 0) {
    return { thumbPosition: 0, thumbSize: track, scrollable: false };
  }

  const thumbSize = Math.min(track, Math.max(1, Math.floor((viewportLength / contentLength) * track)));
  const maxScroll = contentLength - viewportLength;
  const ratio = Math.max(0, Math.min(1, position / maxScroll));
  const thumbPosition = Math.max(0, Math.min(track - thumbSize, Math.floor(ratio * (track - thumbSize))));

  return { thumbPosition, thumbSize, scrollable: true };
}

/**
 * Scroll ratio (0-1) for a click on row `clickRow` of a track of `trackLength` cells.
 */
export function scrollRatioAt(clickRow: number, trackLength: number): number {
  if (trackLength <= 1) return 0;
  return Math.max(0, Math.min(1, clickRow / (trackLength - 1)));
}

export interface ScrollbarOptions {
  metrics: ScrollbarMetrics;

  thumbStyle?: CellStyle;
  trackStyle?: CellStyle;

  // Characters (defaults: █ and ░, # and . on ASCII terminals)
  thumbChar?: string;
  trackChar?: string;

  renderTrack?: boolean; // default true
}

export function renderScrollbar(
  surface: RenderSurface,
  x: number,
  y: number,
  height: number,
  options: ScrollbarOptions
): void {
  if (height <= 0) return;

  const unicodeOk = isUnicodeSupported();
  const thumbChar = options.thumbChar ?? (unicodeOk ? '█' : '#');
  const trackChar = options.trackChar ?? (unicodeOk ? '░' : '.');
  const renderTrack = options.renderTrack ?? true;
  const { thumbPosition, thumbSize } = options.metrics;

  for (let i = 0; i < height; i++) {
    const isThumb = i >= thumbPosition && i < thumbPosition + thumbSize;

    if (isThumb) {
      surface.setCell(x, y + i, { ...options.thumbStyle, char: thumbChar });
    } else if (renderTrack) {
      surface.setCell(x, y + i, { ...options.trackStyle, char: trackChar });
    }
  }
}

export interface ScrollbarLayout {
  visible: boolean;
  heights: number[];
  contentWidth: number;
}

/**
 * Decide scrollbar visibility and measure item heights at the resulting width.
 *
 * `as-needed` is decided exactly. Every item is at least one row, so when
 * there are more items than viewport rows the column is reserved before
 * measuring. Otherwise items are measured at full width, and only if their
 * total overflows are they measured again with the column reserved.
 */
export function layoutWithScrollbar(
  policy: ScrollbarPolicy,
  itemCount: number,
  width: number,
  viewportHeight: number,
  measure: (contentWidth: number) => number[]
): ScrollbarLayout {
  const total = (heights: number[]) => heights.reduce((sum, h) => sum + h, 0);

  // A single column has no room for both content and a scrollbar
  if (policy === 'never' || width <= 1) {
    const contentWidth = Math.max(1, width);
    return { visible: false, heights: measure(contentWidth), contentWidth };
  }
  if (policy === 'always' || itemCount > viewportHeight) {
    const contentWidth = Math.max(1, width - 1);
    return { visible: true, heights: measure(contentWidth), contentWidth };
  }

  const full = measure(width);
  if (total(full) <= viewportHeight) {
    return { visible: false, heights: full, contentWidth: width };
  }
  const narrow = Math.max(1, width - 1);
  return { visible: true, heights: measure(narrow), contentWidth: narrow };
}
