// In-memory character buffer used for headless rendering and tests

import type { TerminalColor } from './types.ts';

export const EMPTY_CHAR = ' ';

export interface Cell {
  char: string;
  foreground?: TerminalColor;
  background?: TerminalColor;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  dim?: boolean;
  reverse?: boolean; // Swap foreground and background colors
}

// Styling attributes of a cell without its character
export type CellStyle = Omit<Cell, 'char'>;

/**
 * Drawing target for views. Coordinates are absolute; writes outside the
 * surface are ignored.
 */
export interface RenderSurface {
  readonly width: number;
  readonly height: number;
  setCell(x: number, y: number, cell: Cell): void;
  setText(x: number, y: number, text: string, style?: CellStyle): void;
  fillRect(x: number, y: number, width: number, height: number, cell: Cell): void;
}

export class TerminalBuffer implements RenderSurface {
  private _width: number;
  private _height: number;
  private _cells: Cell[][];
  private _defaultCell: Cell;

  constructor(width: number, height: number, defaultCell: Cell = { char: EMPTY_CHAR }) {
    this._width = Math.max(0, width);
    this._height = Math.max(0, height);
    this._defaultCell = defaultCell;
    this._cells = this._createEmptyBuffer();
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  private _createEmptyBuffer(): Cell[][] {
    const buffer: Cell[][] = [];
    for (let y = 0; y < this._height; y++) {
      buffer[y] = [];
      for (let x = 0; x < this._width; x++) {
        buffer[y][x] = { ...this._defaultCell };
      }
    }
    return buffer;
  }

  clear(): void {
    this._cells = this._createEmptyBuffer();
  }

  setCell(x: number, y: number, cell: Cell): void {
    if (x < 0 || x >= this._width || y < 0 || y >= this._height) {
      return;
    }
    this._cells[y][x] = { ...cell };
  }

  getCell(x: number, y: number): Cell | undefined {
    if (x >= 0 && x < this._width && y >= 0 && y < this._height) {
      return { ...this._cells[y][x] };
    }
    return undefined;
  }

  // One cell per code point
  setText(x: number, y: number, text: string, style: CellStyle = {}): void {
    let cx = x;
    for (const char of text) {
      if (cx >= this._width) break;
      this.setCell(cx, y, { ...style, char });
      cx++;
    }
  }

  fillRect(x: number, y: number, width: number, height: number, cell: Cell): void {
    for (let dy = 0; dy < height; dy++) {
      for (let dx = 0; dx < width; dx++) {
        this.setCell(x + dx, y + dy, cell);
      }
    }
  }

  // Row text with trailing spaces kept
  getLine(y: number): string {
    const row = this._cells[y];
    return row ? row.map((cell) => cell.char).join('') : '';
  }

  // Convert buffer to string representation (useful for debugging)
  toString(): string {
    const lines: string[] = [];
    for (let y = 0; y < this._height; y++) {
      lines.push(this.getLine(y));
    }
    return lines.join('\n');
  }
}
