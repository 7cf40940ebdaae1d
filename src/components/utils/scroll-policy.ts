// Follow policies deciding where the scroll offset sits each render

import type { ScrollManager } from './scroll-manager.ts';
import { ConfigurationError } from '../../utils/error.ts';
import { getLogger } from '../../logging.ts';

const logger = getLogger('ScrollPolicy');

/**
 * - `none`: offset is driven only by explicit scroll operations
 * - `auto-scroll`: keep the selected item in view
 * - `scroll-to-end`: pin to the bottom every render
 * - `sticky-scroll`: follow the bottom until the user scrolls away,
 *   resume once they return to it
 */
export type ScrollPolicy = 'none' | 'auto-scroll' | 'scroll-to-end' | 'sticky-scroll';

/** Row range [start, end) of the selected item */
export interface RowExtent {
  start: number;
  end: number;
}

/**
 * Holds the single active follow policy of a view. A view may start with
 * a default policy; the first explicit choice replaces it.
 */
export class ScrollPolicyController {
  private _policy: ScrollPolicy;
  private _isDefault = true;

  constructor(private _owner = 'view', initial: ScrollPolicy = 'none') {
    this._policy = initial;
  }

  get policy(): ScrollPolicy {
    return this._policy;
  }

  /**
   * Switch policy. Enabling a follow policy while a different, explicitly
   * chosen one is active throws ConfigurationError; 'none' always succeeds
   * and switches following off. Returns true if the policy changed.
   */
  set(policy: ScrollPolicy): boolean {
    const wasDefault = this._isDefault;
    this._isDefault = false;
    if (policy === this._policy) return false;

    if (!wasDefault && policy !== 'none' && this._policy !== 'none') {
      const message = `Cannot enable '${policy}' on ${this._owner}: '${this._policy}' is already active`;
      logger.warn(message);
      throw new ConfigurationError('scrollPolicy', message);
    }

    logger.debug('Scroll policy changed', { owner: this._owner, from: this._policy, to: policy });
    this._policy = policy;
    return true;
  }
}

/**
 * Derive the offset for this render from the active policy. Runs after
 * `scroll.update()` has recorded the measured content height.
 */
export function resolveScrollPolicy(
  policy: ScrollPolicy,
  scroll: ScrollManager,
  selected?: RowExtent
): void {
  switch (policy) {
    case 'none':
      scroll.clamp();
      return;

    case 'auto-scroll':
      scroll.clamp();
      if (selected) {
        scroll.ensureVisible(selected.start, selected.end);
      }
      return;

    case 'scroll-to-end':
      scroll.scrollToEnd();
      return;

    case 'sticky-scroll': {
      scroll.clamp();
      const maxScroll = scroll.maxScroll;
      if (maxScroll > 0 && scroll.offset >= maxScroll) {
        scroll.userScrolledAway = false;
      }
      if (!scroll.userScrolledAway) {
        scroll.offset = maxScroll;
      }
      return;
    }
  }
}
