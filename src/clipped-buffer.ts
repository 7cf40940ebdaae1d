// Clipped surface proxy - clips all drawing operations to a bounds rectangle

import type { Cell, CellStyle, RenderSurface } from './buffer.ts';
import type { Bounds } from './types.ts';
import { clipBounds, pointInBounds } from './geometry.ts';

export class ClippedSurface implements RenderSurface {
  constructor(
    private _surface: RenderSurface,
    private _clip: Bounds
  ) {}

  get width(): number {
    return this._surface.width;
  }

  get height(): number {
    return this._surface.height;
  }

  get clip(): Bounds {
    return { ...this._clip };
  }

  setCell(x: number, y: number, cell: Cell): void {
    if (!pointInBounds(x, y, this._clip)) return;
    this._surface.setCell(x, y, cell);
  }

  setText(x: number, y: number, text: string, style: CellStyle = {}): void {
    if (y < this._clip.y || y >= this._clip.y + this._clip.height) return;

    const chars = Array.from(text);
    const startX = Math.max(x, this._clip.x);
    const endX = Math.min(x + chars.length, this._clip.x + this._clip.width);
    if (startX >= endX) return;

    const offset = startX - x;
    this._surface.setText(startX, y, chars.slice(offset, offset + endX - startX).join(''), style);
  }

  fillRect(x: number, y: number, width: number, height: number, cell: Cell): void {
    const r = clipBounds({ x, y, width, height }, this._clip);
    if (r.width === 0 || r.height === 0) return;
    this._surface.fillRect(r.x, r.y, r.width, r.height, cell);
  }
}
