// Tests for ListView rendering, navigation and input

import { expect, test } from 'vitest';
import { TerminalBuffer } from '../src/buffer.ts';
import { createKeyPressEvent, createMouseEvent, createWheelEvent } from '../src/events.ts';
import { ListView } from '../src/components/list.ts';
import { ConfigurationError } from '../src/utils/error.ts';

const FIVE = ['one', 'two', 'three', 'four', 'five'];

function numbered(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `item ${i}`);
}

function renderTo(list: ListView<string>, buffer: TerminalBuffer): string[] {
  buffer.clear();
  list.render({ x: 0, y: 0, width: buffer.width, height: buffer.height }, buffer);
  return buffer.toString().split('\n');
}

test('auto-scroll keeps the selection in view as it moves down', () => {
  const list = new ListView({ items: FIVE, scrollPolicy: 'auto-scroll' });
  list.render({ x: 0, y: 0, width: 10, height: 3 }, new TerminalBuffer(10, 3));

  const offsets: number[] = [];
  for (let i = 0; i < 4; i++) {
    list.selectNext();
    offsets.push(list.getScrollState().offset);
  }

  expect(offsets).toEqual([0, 0, 1, 2]);
  expect(list.selectedIndex).toBe(4);
  expect(list.selectedItem()).toBe('five');
});

test('auto-scroll before the first render is applied by the render', () => {
  const list = new ListView({ items: FIVE, scrollPolicy: 'auto-scroll', selectedIndex: 4 });
  expect(list.getScrollState().offset).toBe(0);

  list.render({ x: 0, y: 0, width: 10, height: 3 }, new TerminalBuffer(10, 3));
  expect(list.getScrollState().offset).toBe(2);
});

test('renders the highlight symbol, items and scrollbar', () => {
  const list = new ListView({ items: FIVE });
  const buffer = new TerminalBuffer(10, 3);

  expect(renderTo(list, buffer)).toEqual([
    '> one    █',
    '  two    ░',
    '  three  ░',
  ]);
  expect(buffer.getCell(2, 0)?.reverse).toBe(true);
  expect(buffer.getCell(8, 0)?.reverse).toBe(true);
  expect(buffer.getCell(2, 1)?.reverse).toBeUndefined();

  list.scrollToEnd();
  expect(renderTo(list, buffer)).toEqual([
    '  three  ░',
    '  four   ░',
    '  five   █',
  ]);
});

test('as-needed scrollbar stays hidden when the items fit', () => {
  const list = new ListView({ items: ['a', 'b'] });
  const buffer = new TerminalBuffer(6, 3);
  expect(renderTo(list, buffer)).toEqual(['> a   ', '  b   ', '      ']);
});

test('explicit highlight style wins over the theme', () => {
  const list = new ListView({ items: FIVE, highlightStyle: { foreground: 'red' }, scrollbar: 'never' });
  const buffer = new TerminalBuffer(10, 3);
  renderTo(list, buffer);
  expect(buffer.getCell(2, 0)?.foreground).toBe('red');
  expect(buffer.getCell(2, 0)?.reverse).toBeUndefined();
});

test('style resolver supplies the highlight when none is set', () => {
  const list = new ListView({
    items: FIVE,
    scrollbar: 'never',
    styleResolver: { resolve: (role) => (role === 'highlight' ? { background: 'blue' } : undefined) },
  });
  const buffer = new TerminalBuffer(10, 3);
  renderTo(list, buffer);
  expect(buffer.getCell(0, 0)?.background).toBe('blue');
});

test('multi-row items are clipped at the top when scrolled', () => {
  const list = new ListView({ items: ['a\nb', 'c'], highlightSymbol: '', scrollbar: 'never' });
  const buffer = new TerminalBuffer(6, 2);
  expect(renderTo(list, buffer)).toEqual(['a     ', 'b     ']);

  list.scrollBy(1);
  expect(renderTo(list, buffer)).toEqual(['b     ', 'c     ']);
  expect(list.getLastVisibleWindow()).toEqual({
    firstIndex: 0,
    skipRows: 1,
    items: [
      { index: 0, skipRows: 1, rows: 1, y: 0 },
      { index: 1, skipRows: 0, rows: 1, y: 1 },
    ],
  });
});

test('repeatHighlightSymbol marks every row of the selection', () => {
  const list = new ListView({ items: ['a\nb'], highlightSymbol: '*', scrollbar: 'never' });
  const buffer = new TerminalBuffer(4, 2);
  expect(renderTo(list, buffer)).toEqual(['*a  ', ' b  ']);

  list.setRepeatHighlightSymbol(true);
  expect(renderTo(list, buffer)).toEqual(['*a  ', '*b  ']);
});

test('custom renderers receive the item area', () => {
  const list = new ListView({ items: FIVE, scrollbar: 'never' });
  const buffer = new TerminalBuffer(8, 2);
  list.render({ x: 0, y: 0, width: 8, height: 2 }, buffer, (item, area) => {
    area.surface.setText(area.x, area.y, `#${area.index}${item}`);
  });
  expect(buffer.toString()).toBe('> #0one \n  #1two ');
});

test('border and title surround the items', () => {
  const list = new ListView({ items: ['x'], border: 'thin', title: 'Files', highlightSymbol: '', scrollbar: 'never' });
  const buffer = new TerminalBuffer(8, 3);
  expect(renderTo(list, buffer)).toEqual(['┌Files─┐', '│x     │', '└──────┘']);
});

test('degenerate areas render nothing', () => {
  const list = new ListView({ items: FIVE });
  const buffer = new TerminalBuffer(4, 4);
  list.render({ x: 0, y: 0, width: 0, height: 4 }, buffer);

  expect(list.getLastVisibleWindow()).toBeNull();
  expect(list.getScrollState().viewportHeight).toBe(0);
  expect(buffer.toString()).toBe('    \n    \n    \n    ');
  expect(list.handleClick(0, 0)).toBe(false);
});

test('keys move the selection', () => {
  const list = new ListView({ items: numbered(10) });
  list.render({ x: 0, y: 0, width: 12, height: 4 }, new TerminalBuffer(12, 4));

  expect(list.onKeyPress(createKeyPressEvent('PageDown'))).toBe(true);
  expect(list.selectedIndex).toBe(3);
  expect(list.onKeyPress(createKeyPressEvent('End'))).toBe(true);
  expect(list.selectedIndex).toBe(9);
  expect(list.onKeyPress(createKeyPressEvent('k'))).toBe(true);
  expect(list.selectedIndex).toBe(8);
  expect(list.onKeyPress(createKeyPressEvent('Home'))).toBe(true);
  expect(list.selectedIndex).toBe(0);
  expect(list.onKeyPress(createKeyPressEvent('ArrowRight'))).toBe(false);
});

test('setItems clamps the selection', () => {
  const list = new ListView({ items: numbered(10), selectedIndex: 8 });
  list.setItems(numbered(3));
  expect(list.selectedIndex).toBe(2);
  list.setItems([]);
  expect(list.selectedItem()).toBeUndefined();
  list.selectNext();
  expect(list.selectedIndex).toBe(0);
});

test('wheel scrolls the viewport without a follow policy', () => {
  const list = new ListView({ items: numbered(10), wheelStep: 3 });
  list.render({ x: 0, y: 0, width: 12, height: 3 }, new TerminalBuffer(12, 3));

  expect(list.handleWheel(1)).toBe(true);
  expect(list.getScrollState().offset).toBe(3);
  expect(list.selectedIndex).toBe(0);
  expect(list.handleWheel(-5)).toBe(true);
  expect(list.getScrollState().offset).toBe(0);
  expect(list.handleWheel(0)).toBe(false);
});

test('wheel moves the selection under auto-scroll', () => {
  const list = new ListView({ items: numbered(10), wheelStep: 3, scrollPolicy: 'auto-scroll' });
  list.render({ x: 0, y: 0, width: 12, height: 3 }, new TerminalBuffer(12, 3));

  expect(list.handleWheel(1)).toBe(true);
  expect(list.selectedIndex).toBe(3);
  expect(list.getScrollState().offset).toBe(1);
  expect(list.handleWheel(-1)).toBe(true);
  expect(list.handleWheel(-1)).toBe(false);
});

test('clicks select items and jump along the scrollbar', () => {
  const list = new ListView({ items: FIVE, scrollbar: 'always' });
  const buffer = new TerminalBuffer(14, 5);
  list.render({ x: 2, y: 1, width: 10, height: 3 }, buffer);

  expect(list.handleClick(4, 2)).toBe(true);
  expect(list.selectedIndex).toBe(1);
  expect(list.handleClick(0, 0)).toBe(false);

  expect(list.handleClick(11, 3)).toBe(true);
  expect(list.getScrollState().offset).toBe(2);
  expect(list.selectedIndex).toBe(1);
});

test('only one follow policy can be enabled', () => {
  const list = new ListView({ items: FIVE, scrollPolicy: 'auto-scroll' });
  expect(() => list.enableStickyScroll()).toThrow(ConfigurationError);
  expect(list.scrollPolicy).toBe('auto-scroll');

  list.setScrollPolicy('none');
  list.enableStickyScroll();
  expect(list.scrollPolicy).toBe('sticky-scroll');
});

test('scroll-to-end pins the newest items', () => {
  const list = new ListView({ items: numbered(10), scrollPolicy: 'scroll-to-end' });
  const buffer = new TerminalBuffer(12, 3);
  renderTo(list, buffer);
  expect(list.getScrollState().offset).toBe(7);

  list.scrollBy(-2);
  expect(list.getScrollState().offset).toBe(5);
  renderTo(list, buffer);
  expect(list.getScrollState().offset).toBe(7);
});

test('sticky-scroll follows until the user scrolls away and back', () => {
  const list = new ListView({ items: numbered(10), scrollPolicy: 'sticky-scroll' });
  const buffer = new TerminalBuffer(12, 3);
  renderTo(list, buffer);
  expect(list.getScrollState().offset).toBe(7);

  list.selectPrevious();
  expect(list.getScrollState()).toMatchObject({ offset: 6, userScrolledAway: true });

  list.setItems(numbered(12));
  renderTo(list, buffer);
  expect(list.getScrollState().offset).toBe(6);

  list.scrollToEnd();
  expect(list.getScrollState()).toMatchObject({ offset: 9, userScrolledAway: false });

  list.setItems(numbered(15));
  renderTo(list, buffer);
  expect(list.getScrollState().offset).toBe(12);
});

test('End under sticky-scroll resumes following on the next render', () => {
  const list = new ListView({ items: numbered(10), scrollPolicy: 'sticky-scroll' });
  const buffer = new TerminalBuffer(12, 3);
  renderTo(list, buffer);

  list.onKeyPress(createKeyPressEvent('ArrowUp'));
  expect(list.getScrollState()).toMatchObject({ offset: 6, userScrolledAway: true });

  list.onKeyPress(createKeyPressEvent('End'));
  expect(list.getScrollState()).toMatchObject({ offset: 6, userScrolledAway: false });

  renderTo(list, buffer);
  expect(list.getScrollState().offset).toBe(7);
});

test('sticky-scroll stays glued to the bottom while items are appended', () => {
  const list = new ListView<string>({ scrollPolicy: 'sticky-scroll' });
  const buffer = new TerminalBuffer(12, 3);
  for (let count = 0; count <= 12; count += 4) {
    list.setItems(numbered(count));
    renderTo(list, buffer);
    expect(list.getScrollState().offset).toBe(Math.max(0, count - 3));
  }
});

test('handleEvent routes keys, clicks and wheel events', () => {
  const list = new ListView({ id: 'files', items: numbered(10), wheelStep: 3 });
  const buffer = new TerminalBuffer(12, 5);
  const area = { x: 0, y: 1, width: 12, height: 3 };
  list.render(area, buffer);

  expect(list.handleEvent(createWheelEvent(5, 2, 1))).toBe(true);
  expect(list.getScrollState().offset).toBe(3);
  expect(list.handleEvent(createWheelEvent(5, 4, 1))).toBe(false);
  expect(list.handleEvent(createWheelEvent(5, 2, 1, 'other'))).toBe(false);
  expect(list.getScrollState().offset).toBe(3);

  list.render(area, buffer);
  expect(list.handleEvent(createMouseEvent(3, 2, 2))).toBe(false);
  expect(list.handleEvent(createMouseEvent(3, 2))).toBe(true);
  expect(list.selectedIndex).toBe(4);

  expect(list.handleEvent(createKeyPressEvent('j', { target: 'files' }))).toBe(true);
  expect(list.selectedIndex).toBe(5);
  expect(list.handleEvent(createKeyPressEvent('j', { target: 'other' }))).toBe(false);
  expect(list.selectedIndex).toBe(5);
});

test('preferred size covers the highlight symbol, widest item and border', () => {
  const list = new ListView({ items: ['one', 'three'] });
  expect(list.preferredWidth()).toBe(7);
  expect(list.preferredHeight()).toBe(2);

  list.setBorder('thin');
  expect(list.preferredWidth()).toBe(9);
  expect(list.preferredHeight()).toBe(4);

  list.setScrollbarPolicy('always');
  expect(list.preferredWidth()).toBe(10);
});

test('preferred height measures items at the given width', () => {
  const list = new ListView({
    items: ['abcdef', 'a\nbb'],
    highlightSymbol: '',
    scrollbar: 'never',
    measureHeight: (item, width) => Math.ceil(item.length / width),
  });
  expect(list.preferredWidth()).toBe(6);
  expect(list.preferredHeight()).toBe(2);
  expect(list.preferredHeight(3)).toBe(4);
});

test('an empty list prefers no space', () => {
  const list = new ListView<string>({ border: 'thin' });
  expect(list.preferredWidth()).toBe(0);
  expect(list.preferredHeight()).toBe(0);
});
