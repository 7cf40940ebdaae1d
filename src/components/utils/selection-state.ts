// Single-selection index over a linear sequence (list items or flattened tree)

/**
 * Selected index clamped into [0, itemCount) whenever itemCount > 0, else 0.
 *
 * The count is passed to each mutator rather than stored, because the
 * sequence (a flattened tree in particular) can change length between calls.
 * Out-of-range requests are clamped, never rejected.
 */
export class SelectionState {
  private _index = 0;

  get index(): number {
    return this._index;
  }

  static clampIndex(index: number, itemCount: number): number {
    if (itemCount <= 0 || !Number.isFinite(index)) return 0;
    return Math.max(0, Math.min(Math.trunc(index), itemCount - 1));
  }

  /**
   * Re-clamp the stored index after the sequence changed length.
   * Returns the clamped index.
   */
  clampTo(itemCount: number): number {
    this._index = SelectionState.clampIndex(this._index, itemCount);
    return this._index;
  }

  select(index: number, itemCount: number): number {
    this._index = SelectionState.clampIndex(index, itemCount);
    return this._index;
  }

  moveBy(delta: number, itemCount: number): number {
    return this.select(this.clampTo(itemCount) + delta, itemCount);
  }

  selectNext(itemCount: number): number {
    return this.moveBy(1, itemCount);
  }

  selectPrevious(itemCount: number): number {
    return this.moveBy(-1, itemCount);
  }

  selectFirst(itemCount: number): number {
    return this.select(0, itemCount);
  }

  selectLast(itemCount: number): number {
    return this.select(itemCount - 1, itemCount);
  }
}
