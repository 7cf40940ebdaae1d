// List view - virtualized, scrollable list of items with single selection

import { ScrollableView, type ItemArea, type ScrollableViewProps } from './scrollable-view.ts';
import type { MeasureHeight } from './utils/viewport-calculator.ts';
import { defaultMeasureHeight, splitLines, textWidth } from './utils/text.ts';

export interface ListViewProps<T> extends ScrollableViewProps {
  items?: readonly T[];
  /** Rows per item at a given width. Defaults to the line count of strings, 1 otherwise */
  measureHeight?: MeasureHeight<T>;
  /** Text drawn by the default renderer. Defaults to String(item) */
  formatItem?: (item: T) => string;
  selectedIndex?: number;
}

export class ListView<T> extends ScrollableView<T> {
  private _items: readonly T[];
  private _measureHeight: MeasureHeight<T>;
  private _formatItem: (item: T) => string;

  constructor(props: ListViewProps<T> = {}) {
    super(props);
    this._items = props.items ?? [];
    this._measureHeight = props.measureHeight ?? defaultMeasureHeight;
    this._formatItem = props.formatItem ?? String;
    if (props.selectedIndex !== undefined) {
      this._selection.select(props.selectedIndex, this._items.length);
    }
  }

  get items(): readonly T[] {
    return this._items;
  }

  /** Replace the items. The selection is clamped into the new range. */
  setItems(items: readonly T[]): void {
    this._items = items;
    this._selection.clampTo(items.length);
  }

  setMeasureHeight(measure: MeasureHeight<T>): void {
    this._measureHeight = measure;
  }

  selectedItem(): T | undefined {
    if (this._items.length === 0) return undefined;
    return this._items[this.selectedIndex];
  }

  protected _entries(): readonly T[] {
    return this._items;
  }

  protected _measure(item: T, width: number): number {
    return this._measureHeight(item, width);
  }

  protected _naturalWidth(item: T): number {
    return Math.max(0, ...splitLines(this._formatItem(item)).map(textWidth));
  }

  protected _renderDefault(item: T, area: ItemArea): void {
    const lines = splitLines(this._formatItem(item));
    const style = area.selected ? area.highlightStyle : {};
    for (let row = 0; row < area.height; row++) {
      const line = lines[area.skipRows + row];
      if (line !== undefined) {
        area.surface.setText(area.x, area.y + row, line, style);
      }
    }
  }
}
