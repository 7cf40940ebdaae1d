/**
 * Terminal capability detection for glyph selection.
 *
 * Scrollbars, tree guides and expand indicators pick their characters from
 * the Unicode tier detected here.
 */

import { getLogger } from '../logging.ts';
import { Env } from '../env.ts';
import { TermscrollConfig } from '../config/mod.ts';

const logger = getLogger('TerminalDetect');

/**
 * Three-tier Unicode capability model.
 *
 * - **full**  Modern terminal emulators (xterm, kitty, etc.): all box-drawing
 *             and block elements, rounded corners.
 * - **basic** Linux virtual console (TERM=linux): thin + double box-drawing,
 *             common block elements (█ ░ ▒ ▓).
 * - **ascii** Legacy hardware terminals (vt100, vt220): ASCII only.
 */
export type UnicodeTier = 'full' | 'basic' | 'ascii';

let _unicodeTier: UnicodeTier | undefined;

function detectFromTerm(): UnicodeTier {
  const term = Env.get('TERM') || '';
  if (term === 'vt100' || term === 'vt220') return 'ascii';
  if (term === 'linux') return 'basic';
  return 'full';
}

export function getUnicodeTier(): UnicodeTier {
  if (_unicodeTier !== undefined) return _unicodeTier;
  const setting = TermscrollConfig.get().unicode;
  _unicodeTier = setting === 'auto' ? detectFromTerm() : setting;
  logger.debug(`Unicode tier: ${_unicodeTier}`, { setting, term: Env.get('TERM') ?? '' });
  return _unicodeTier;
}

/**
 * Returns true when the terminal supports at least basic Unicode (box-drawing,
 * block elements).
 */
export function isUnicodeSupported(): boolean {
  return getUnicodeTier() !== 'ascii';
}

/**
 * Forget the cached tier (after TERM or config changes, and in tests).
 */
export function resetUnicodeTier(): void {
  _unicodeTier = undefined;
}
