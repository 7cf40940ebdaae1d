// Theme system for termscroll views - config and environment driven

import type { TerminalColor } from './types.ts';
import { Env } from './env.ts';
import { TermscrollConfig } from './config/mod.ts';
import { getLogger } from './logging.ts';
import builtinThemes from './themes/themes.json';

const logger = getLogger('Theme');

export type ThemeType = 'bw' | 'color';
export type ThemeMode = 'std' | 'dark';

export interface ColorPalette {
  primary: TerminalColor;
  background: TerminalColor;
  foreground: TerminalColor;
  border: TerminalColor;

  // Selected item
  focusPrimary: TerminalColor;
  focusBackground: TerminalColor;

  // Tree guides and indicators
  textSecondary: TerminalColor;

  scrollbarThumb: TerminalColor;
  scrollbarTrack: TerminalColor;
}

export interface Theme {
  name: string;
  type: ThemeType;
  mode: ThemeMode;
  palette: ColorPalette;
}

interface RawTheme {
  type: string;
  mode: string;
  palette: Partial<Record<string, string>>;
}

const PALETTE_KEYS: (keyof ColorPalette)[] = [
  'primary', 'background', 'foreground', 'border',
  'focusPrimary', 'focusBackground', 'textSecondary',
  'scrollbarThumb', 'scrollbarTrack',
];

const FALLBACK_COLOR: TerminalColor = 'magenta'; // visible mistake

/**
 * Build a Theme from its JSON description.
 * Unknown type/mode values fall back to bw/dark; missing palette
 * entries become a loud fallback color.
 */
export function buildTheme(name: string, raw: RawTheme): Theme {
  const type: ThemeType = raw.type === 'color' ? 'color' : 'bw';
  const mode: ThemeMode = raw.mode === 'std' ? 'std' : 'dark';
  if (raw.type !== type || raw.mode !== mode) {
    logger.warn(`Theme '${name}': invalid type/mode`, { type: raw.type, mode: raw.mode });
  }

  const palette: ColorPalette = {
    primary: FALLBACK_COLOR,
    background: FALLBACK_COLOR,
    foreground: FALLBACK_COLOR,
    border: FALLBACK_COLOR,
    focusPrimary: FALLBACK_COLOR,
    focusBackground: FALLBACK_COLOR,
    textSecondary: FALLBACK_COLOR,
    scrollbarThumb: FALLBACK_COLOR,
    scrollbarTrack: FALLBACK_COLOR,
  };
  for (const key of PALETTE_KEYS) {
    const value = raw.palette[key];
    if (value === undefined) {
      logger.warn(`Theme '${name}': missing palette entry ${key}`);
    } else {
      palette[key] = value;
    }
  }

  return { name, type, mode, palette };
}

const BUILTIN_THEME_NAMES = ['bw-std', 'bw-dark', 'color-std', 'color-dark'] as const;

const THEMES: Record<string, Theme> = Object.fromEntries(
  Object.entries<RawTheme>(builtinThemes).map(([name, raw]) => [name, buildTheme(name, raw)])
);

// Terminal capability detection for auto theme selection

function detectThemeType(): ThemeType {
  const colorterm = Env.get('COLORTERM') || '';
  const term = Env.get('TERM') || '';
  if (colorterm !== '' || term.includes('color') || term.includes('xterm') ||
      term.includes('screen') || term.includes('tmux')) {
    return 'color';
  }
  return 'bw';
}

/**
 * Detect if terminal is in dark mode.
 * COLORFGBG has the form "fg;bg"; background colors 0-7 are dark.
 */
function detectDarkMode(): boolean {
  const colorfgbg = Env.get('COLORFGBG');
  if (colorfgbg) {
    const parts = colorfgbg.split(';');
    if (parts.length >= 2) {
      const bg = parseInt(parts[parts.length - 1], 10);
      if (!isNaN(bg)) {
        return bg < 8;
      }
    }
  }
  return true;
}

function detectTheme(forceMode?: ThemeMode): string {
  const mode = forceMode ?? (detectDarkMode() ? 'dark' : 'std');
  return `${detectThemeType()}-${mode}`;
}

export class ThemeManager {
  private _currentTheme: Theme;
  private _colorOverrides: Partial<ColorPalette> = {};

  constructor() {
    const themeName = this._resolveThemeName();
    logger.debug(`ThemeManager: selected theme '${themeName}'`);
    this._currentTheme = this._getThemeByName(themeName);
  }

  private _resolveThemeName(): string {
    // Respect NO_COLOR (https://no-color.org/)
    if (Env.get('NO_COLOR') !== undefined) {
      return detectDarkMode() ? 'bw-dark' : 'bw-std';
    }

    const configured = TermscrollConfig.get().theme.toLowerCase().trim();
    switch (configured) {
      case 'auto':
        return detectTheme();
      case 'auto-dark':
        return detectTheme('dark');
      case 'auto-std':
        return detectTheme('std');
      default:
        return configured;
    }
  }

  private _getThemeByName(name: string): Theme {
    const theme = THEMES[name];
    if (!theme) {
      logger.warn(`Theme '${name}' not found. Using 'bw-dark'`);
      return THEMES['bw-dark'];
    }
    return theme;
  }

  getCurrentTheme(): Theme {
    return this._currentTheme;
  }

  setTheme(themeName: string): void {
    this._currentTheme = this._getThemeByName(themeName);
  }

  getAvailableThemes(): string[] {
    return [...BUILTIN_THEME_NAMES];
  }

  isColorSupported(): boolean {
    return this._currentTheme.type !== 'bw';
  }

  isDarkMode(): boolean {
    return this._currentTheme.mode === 'dark';
  }

  // Overrides take priority over the palette
  getColor(colorName: keyof ColorPalette): TerminalColor {
    return this._colorOverrides[colorName] ?? this._currentTheme.palette[colorName];
  }

  setColorOverrides(overrides: Partial<ColorPalette>): void {
    this._colorOverrides = overrides;
  }
}

let globalThemeManager: ThemeManager | null = null;

export function getThemeManager(): ThemeManager {
  if (!globalThemeManager) {
    globalThemeManager = new ThemeManager();
  }
  return globalThemeManager;
}

/**
 * Drop the global manager so the next access re-reads config (for testing)
 */
export function resetThemeManager(): void {
  globalThemeManager = null;
}

export function getCurrentTheme(): Theme {
  return getThemeManager().getCurrentTheme();
}

export function getThemeColor(colorName: keyof ColorPalette): TerminalColor {
  return getThemeManager().getColor(colorName);
}
