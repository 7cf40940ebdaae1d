// Tests for the terminal buffer and clipped surfaces

import { expect, test } from 'vitest';
import { TerminalBuffer, type Cell } from '../src/buffer.ts';
import { ClippedSurface } from '../src/clipped-buffer.ts';
import { clipBounds, insetBounds } from '../src/geometry.ts';
import { getBorderChars } from '../src/types.ts';

test('TerminalBuffer creation and basic operations', () => {
  const buffer = new TerminalBuffer(10, 5);
  expect(buffer.width).toBe(10);
  expect(buffer.height).toBe(5);
  expect(buffer.getCell(0, 0)?.char).toBe(' ');
});

test('TerminalBuffer setCell and getCell', () => {
  const buffer = new TerminalBuffer(5, 5);
  const cell: Cell = { char: 'A', foreground: 'red', bold: true };
  buffer.setCell(2, 3, cell);

  expect(buffer.getCell(2, 3)).toEqual(cell);
});

test('TerminalBuffer ignores writes out of bounds', () => {
  const buffer = new TerminalBuffer(3, 3);
  buffer.setCell(-1, 0, { char: 'X' });
  buffer.setCell(3, 0, { char: 'X' });
  buffer.setCell(0, 3, { char: 'X' });

  expect(buffer.getCell(-1, 0)).toBeUndefined();
  expect(buffer.getCell(3, 0)).toBeUndefined();
  expect(buffer.toString()).toBe('   \n   \n   ');
});

test('setText writes one cell per code point', () => {
  const buffer = new TerminalBuffer(6, 1);
  buffer.setText(1, 0, '▶é😀ab', { dim: true });
  expect(buffer.getLine(0)).toBe(' ▶é😀ab');
  expect(buffer.getCell(3, 0)?.char).toBe('😀');
  expect(buffer.getCell(4, 0)?.dim).toBe(true);
});

test('fillRect fills the clipped rectangle', () => {
  const buffer = new TerminalBuffer(4, 3);
  buffer.fillRect(2, 1, 5, 5, { char: '#' });
  expect(buffer.toString()).toBe('    \n  ##\n  ##');
});

test('ClippedSurface clips text to its bounds', () => {
  const buffer = new TerminalBuffer(10, 2);
  const surface = new ClippedSurface(buffer, { x: 2, y: 0, width: 3, height: 1 });

  surface.setText(0, 0, 'abcdef');
  surface.setText(0, 1, 'hidden');
  expect(buffer.toString()).toBe('  cde     \n          ');
});

test('ClippedSurface clips cells and rectangles', () => {
  const buffer = new TerminalBuffer(5, 3);
  const surface = new ClippedSurface(buffer, { x: 1, y: 1, width: 2, height: 2 });

  surface.setCell(0, 0, { char: 'X' });
  surface.setCell(1, 1, { char: 'Y' });
  surface.fillRect(2, 0, 3, 3, { char: '.' });
  expect(buffer.toString()).toBe('     \n Y.  \n  .  ');
  expect(surface.clip).toEqual({ x: 1, y: 1, width: 2, height: 2 });
});

test('nested clipped surfaces intersect', () => {
  const buffer = new TerminalBuffer(6, 1);
  const outer = new ClippedSurface(buffer, { x: 0, y: 0, width: 4, height: 1 });
  const inner = new ClippedSurface(outer, { x: 2, y: 0, width: 4, height: 1 });
  inner.setText(0, 0, 'abcdef');
  expect(buffer.getLine(0)).toBe('  cd  ');
});

test('geometry helpers', () => {
  expect(insetBounds({ x: 0, y: 0, width: 1, height: 5 }, 1)).toEqual({ x: 1, y: 1, width: 0, height: 3 });
  expect(clipBounds({ x: 0, y: 0, width: 4, height: 4 }, { x: 2, y: 3, width: 5, height: 5 }))
    .toEqual({ x: 2, y: 3, width: 2, height: 1 });
});

test('border characters degrade with the terminal', () => {
  expect(getBorderChars('rounded').tl).toBe('╭');
  expect(getBorderChars('rounded', 'basic').tl).toBe('┌');
  expect(getBorderChars('double', 'basic').tl).toBe('╔');
  expect(getBorderChars('thin', 'ascii').tl).toBe('+');
});
