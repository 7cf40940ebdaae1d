// Tests for SelectionState

import { expect, test } from 'vitest';
import { SelectionState } from '../src/components/utils/selection-state.ts';

test('clampIndex keeps indices inside the sequence', () => {
  expect(SelectionState.clampIndex(5, 0)).toBe(0);
  expect(SelectionState.clampIndex(-2, 3)).toBe(0);
  expect(SelectionState.clampIndex(7, 3)).toBe(2);
  expect(SelectionState.clampIndex(1.9, 3)).toBe(1);
  expect(SelectionState.clampIndex(Number.NaN, 3)).toBe(0);
});

test('moves are clamped at both ends', () => {
  const selection = new SelectionState();
  expect(selection.selectPrevious(4)).toBe(0);
  expect(selection.selectNext(4)).toBe(1);
  expect(selection.moveBy(10, 4)).toBe(3);
  expect(selection.selectNext(4)).toBe(3);
  expect(selection.selectFirst(4)).toBe(0);
  expect(selection.selectLast(4)).toBe(3);
});

test('clampTo follows a shrinking sequence', () => {
  const selection = new SelectionState();
  selection.select(6, 10);
  expect(selection.clampTo(4)).toBe(3);
  expect(selection.index).toBe(3);
  expect(selection.clampTo(0)).toBe(0);
});

test('moveBy starts from the clamped index', () => {
  const selection = new SelectionState();
  selection.select(8, 10);
  expect(selection.moveBy(-1, 3)).toBe(1);
});
