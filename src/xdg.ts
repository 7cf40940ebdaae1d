// XDG Base Directory Specification support
// https://specifications.freedesktop.org/basedir/latest/

import { join } from 'node:path';
import { Env } from './env.ts';

const APP_NAME = 'termscroll';

/**
 * Get the home directory, with Windows fallback
 */
function getHomeDir(): string {
  return Env.get('HOME') || Env.get('USERPROFILE') || '.';
}

/**
 * Get the XDG config directory for user-specific configuration files.
 *
 * Default: $HOME/.config/termscroll
 */
export function getConfigDir(): string {
  const baseDir = Env.get('XDG_CONFIG_HOME') || join(getHomeDir(), '.config');
  return join(baseDir, APP_NAME);
}

/**
 * Get the XDG cache directory for user-specific non-essential cached data.
 *
 * Default: $HOME/.cache/termscroll
 */
export function getCacheDir(): string {
  const baseDir = Env.get('XDG_CACHE_HOME') || join(getHomeDir(), '.cache');
  return join(baseDir, APP_NAME);
}
