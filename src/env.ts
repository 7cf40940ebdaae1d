/**
 * Environment variable access.
 *
 * Use Env.get() instead of reading process.env directly so tests can
 * override values through Env.set() and restore them afterwards.
 */

export class Env {
  /**
   * Get env var value (fresh value each call).
   * Returns undefined if var is unset.
   */
  static get(name: string): string | undefined {
    return process.env[name];
  }

  /**
   * Check if env var is set (an empty string counts as set).
   */
  static has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  static set(name: string, value: string): void {
    process.env[name] = value;
  }

  static delete(name: string): void {
    delete process.env[name];
  }

  /**
   * Get names of all env vars with the given prefix.
   */
  static keys(prefix = ''): string[] {
    return Object.keys(process.env).filter((name) => name.startsWith(prefix));
  }
}
