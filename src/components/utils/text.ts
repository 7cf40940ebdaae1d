// Text helpers for default item renderers and titles
// Widths count code points; every code point takes one cell

export function textWidth(text: string): number {
  return Array.from(text).length;
}

export function truncateText(text: string, width: number): string {
  if (width <= 0) return '';
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width <= 3) return chars.slice(0, width).join('');
  return chars.slice(0, width - 3).join('') + '...';
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Height of a value rendered as text: its line count for strings, else 1.
 */
export function defaultMeasureHeight(item: unknown): number {
  return typeof item === 'string' ? splitLines(item).length : 1;
}
