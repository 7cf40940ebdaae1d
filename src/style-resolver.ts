// Style resolution for view chrome: highlight, border and scrollbar
// Precedence is explicit > resolver > built-in default

import type { CellStyle } from './buffer.ts';
import { getThemeManager, type ThemeManager } from './theme.ts';

export type StyleRole = 'highlight' | 'border' | 'scrollbar-thumb' | 'scrollbar-track';

/**
 * Supplies styles for a role when the view has no explicit value.
 * Returning undefined defers to the built-in default.
 */
export interface StyleResolver {
  resolve(role: StyleRole): CellStyle | undefined;
}

const DEFAULT_STYLES: Record<StyleRole, CellStyle> = {
  highlight: { reverse: true },
  border: {},
  'scrollbar-thumb': {},
  'scrollbar-track': {},
};

export function getDefaultStyle(role: StyleRole): CellStyle {
  return { ...DEFAULT_STYLES[role] };
}

export function resolveStyle(
  role: StyleRole,
  explicit: CellStyle | undefined,
  resolver: StyleResolver | undefined
): CellStyle {
  return explicit ?? resolver?.resolve(role) ?? getDefaultStyle(role);
}

/**
 * Resolver backed by the current theme. Black-and-white themes resolve
 * nothing, so the reverse-video highlight default applies there.
 */
export function createThemeStyleResolver(manager: ThemeManager = getThemeManager()): StyleResolver {
  return {
    resolve(role: StyleRole): CellStyle | undefined {
      if (!manager.isColorSupported()) return undefined;
      switch (role) {
        case 'highlight':
          return {
            foreground: manager.getColor('focusPrimary'),
            background: manager.getColor('focusBackground'),
            bold: true,
          };
        case 'border':
          return { foreground: manager.getColor('border') };
        case 'scrollbar-thumb':
          return { foreground: manager.getColor('scrollbarThumb') };
        case 'scrollbar-track':
          return { foreground: manager.getColor('scrollbarTrack') };
      }
    },
  };
}
