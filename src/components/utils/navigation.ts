// Maps input to selection and scroll changes, depending on the follow policy

import type { KeyPressEvent } from '../../events.ts';
import type { ScrollManager } from './scroll-manager.ts';
import type { SelectionState } from './selection-state.ts';
import type { ScrollPolicy } from './scroll-policy.ts';

export type NavigationAction = 'move-up' | 'move-down' | 'page-up' | 'page-down' | 'home' | 'end';
export type TreeAction = 'expand' | 'collapse' | 'toggle';

/**
 * Key -> action. Modified keys (ctrl/alt/meta) are left to the host.
 */
export function keyToNavigationAction(event: KeyPressEvent): NavigationAction | undefined {
  if (event.ctrlKey || event.altKey || event.metaKey) return undefined;
  switch (event.key) {
    case 'ArrowUp':
    case 'k':
      return 'move-up';
    case 'ArrowDown':
    case 'j':
      return 'move-down';
    case 'PageUp':
      return 'page-up';
    case 'PageDown':
      return 'page-down';
    case 'Home':
      return 'home';
    case 'End':
      return 'end';
    default:
      return undefined;
  }
}

export function keyToTreeAction(event: KeyPressEvent): TreeAction | undefined {
  if (event.ctrlKey || event.altKey || event.metaKey) return undefined;
  switch (event.key) {
    case 'ArrowRight':
    case 'l':
      return 'expand';
    case 'ArrowLeft':
    case 'h':
      return 'collapse';
    case ' ':
    case 'Enter':
      return 'toggle';
    default:
      return undefined;
  }
}

/** Rows or items moved by PageUp/PageDown: one less than the viewport */
export function pageSize(viewportHeight: number): number {
  return Math.max(1, viewportHeight - 1);
}

export interface NavigationTarget {
  policy: ScrollPolicy;
  scroll: ScrollManager;
  selection: SelectionState;
  itemCount: number;
}

export type NavigationResult = 'selection' | 'scroll' | 'none';

/**
 * Apply a navigation action.
 *
 * Under sticky-scroll the keys drive the offset directly and mark the view
 * as scrolled away; `end` only clears that mark, so the next render pins
 * to the then-current bottom. Under every other policy they move the
 * selection, clamped to the sequence.
 *
 * Returns which kind of state was touched.
 */
export function applyNavigation(action: NavigationAction, target: NavigationTarget): NavigationResult {
  const { scroll, selection, itemCount } = target;

  if (target.policy === 'sticky-scroll') {
    const page = pageSize(scroll.viewportHeight);
    switch (action) {
      case 'move-up':
        scroll.scrollBy(-1);
        break;
      case 'move-down':
        scroll.scrollBy(1);
        break;
      case 'page-up':
        scroll.scrollBy(-page);
        break;
      case 'page-down':
        scroll.scrollBy(page);
        break;
      case 'home':
        scroll.setOffset(0);
        break;
      case 'end':
        scroll.userScrolledAway = false;
        return 'scroll';
    }
    scroll.userScrolledAway = true;
    return 'scroll';
  }

  if (itemCount <= 0) {
    selection.clampTo(0);
    return 'none';
  }

  switch (action) {
    case 'move-up':
      selection.selectPrevious(itemCount);
      break;
    case 'move-down':
      selection.selectNext(itemCount);
      break;
    case 'page-up':
      selection.moveBy(-pageSize(scroll.viewportHeight), itemCount);
      break;
    case 'page-down':
      selection.moveBy(pageSize(scroll.viewportHeight), itemCount);
      break;
    case 'home':
      selection.selectFirst(itemCount);
      break;
    case 'end':
      selection.selectLast(itemCount);
      break;
  }
  return 'selection';
}
