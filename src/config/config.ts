// Schema-driven configuration for termscroll views

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import schema from './schema.json';
import { Env } from '../env.ts';
import { getConfigDir } from '../xdg.ts';
import { configureLogging, getLogger } from '../logging.ts';
import { ensureError } from '../utils/error.ts';

const logger = getLogger('Config');

/**
 * Schema property definition
 */
interface ConfigProperty {
  type: string;
  default?: unknown;
  env?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  description?: string;
}

/**
 * Config schema structure
 */
export interface ConfigSchema {
  properties: Record<string, ConfigProperty>;
}

const SCHEMA: ConfigSchema = schema;

/**
 * Where a value came from.
 *
 * Priority order (lowest to highest):
 * 1. Schema defaults
 * 2. File config (~/.config/termscroll/config.json or TERMSCROLL_CONFIG_FILE)
 * 3. Env vars
 * 4. Runtime overrides (init options or setValue)
 */
export type ConfigSource = 'default' | 'file' | 'env' | 'runtime';

export interface ConfigInitOptions {
  // Values applied on top of every other source, keyed by dotted path
  overrides?: Record<string, unknown>;
  // Skip reading the config file (tests, embedding hosts)
  skipFile?: boolean;
}

export type ScrollbarPolicySetting = 'never' | 'always' | 'as-needed';
export type GuideStyleSetting = 'unicode' | 'ascii' | 'bold' | 'double' | 'none';
export type UnicodeSetting = 'auto' | 'full' | 'basic' | 'ascii';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function getConfigFilePath(): string {
  return Env.get('TERMSCROLL_CONFIG_FILE') || join(getConfigDir(), 'config.json');
}

let _instance: TermscrollConfig | null = null;

export class TermscrollConfig {
  private _data: Record<string, unknown> = {};
  private _sources: Record<string, ConfigSource> = {};

  private constructor(fileConfig: Record<string, unknown>, overrides: Record<string, unknown>) {
    for (const [path, prop] of Object.entries(SCHEMA.properties)) {
      const { value, source } = this._resolveValue(path, prop, fileConfig);
      this._data[path] = value;
      this._sources[path] = source;
    }

    for (const [path, value] of Object.entries(overrides)) {
      this._data[path] = this._coerce(path, value);
      this._sources[path] = 'runtime';
    }
  }

  private _resolveValue(
    path: string,
    prop: ConfigProperty,
    fileConfig: Record<string, unknown>
  ): { value: unknown; source: ConfigSource } {
    // 1. Env var
    if (prop.env) {
      const envVal = Env.get(prop.env);
      if (envVal !== undefined) {
        const parsed = this._parseEnvValue(envVal, prop);
        if (parsed !== undefined) {
          return { value: parsed, source: 'env' };
        }
        logger.warn(`Ignoring invalid value for ${prop.env}`, { value: envVal, key: path });
      }
    }

    // 2. File config
    const fileVal = this._getPath(fileConfig, path);
    if (fileVal !== undefined) {
      if (this._isValid(fileVal, prop)) return { value: fileVal, source: 'file' };
      logger.warn(`Ignoring invalid config file value for ${path}`, { value: fileVal });
    }

    // 3. Default from schema
    return { value: prop.default, source: 'default' };
  }

  private _parseEnvValue(value: string, prop: ConfigProperty): unknown {
    let parsed: unknown;
    switch (prop.type) {
      case 'boolean':
        parsed = value === 'true' || value === '1';
        break;
      case 'integer':
        parsed = /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : undefined;
        break;
      case 'number':
        parsed = value.trim() === '' ? undefined : Number(value);
        break;
      default:
        // Log levels are matched case-insensitively
        parsed = prop.enum?.includes(value.toUpperCase()) && !prop.enum.includes(value)
          ? value.toUpperCase()
          : value;
    }
    return parsed !== undefined && this._isValid(parsed, prop) ? parsed : undefined;
  }

  private _isValid(value: unknown, prop: ConfigProperty): boolean {
    switch (prop.type) {
      case 'integer':
      case 'number':
        if (typeof value !== 'number' || Number.isNaN(value)) return false;
        if (prop.type === 'integer' && !Number.isInteger(value)) return false;
        if (prop.minimum !== undefined && value < prop.minimum) return false;
        if (prop.maximum !== undefined && value > prop.maximum) return false;
        return true;
      case 'boolean':
        return typeof value === 'boolean';
      default:
        if (typeof value !== 'string') return false;
        return prop.enum === undefined || prop.enum.includes(value);
    }
  }

  /**
   * Look up a dotted path, first as a flat key, then as nested objects.
   */
  private _getPath(obj: Record<string, unknown>, path: string): unknown {
    if (path in obj) {
      return obj[path];
    }

    let current: unknown = obj;
    for (const part of path.split('.')) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  private _coerce(key: string, value: unknown): unknown {
    const prop = SCHEMA.properties[key];
    if (!prop || typeof value !== 'string') return value;
    switch (prop.type) {
      case 'integer': {
        const n = parseInt(value, 10);
        return Number.isNaN(n) ? value : n;
      }
      case 'number': {
        const n = parseFloat(value);
        return Number.isNaN(n) ? value : n;
      }
      case 'boolean':
        return value === 'true' || value === '1';
      default:
        return value;
    }
  }

  /**
   * Initialize config (call once at startup)
   */
  static init(options: ConfigInitOptions = {}): TermscrollConfig {
    if (_instance) {
      throw new Error('TermscrollConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    const fileConfig = options.skipFile ? {} : this._loadConfigFile();
    const config = new TermscrollConfig(fileConfig, options.overrides ?? {});
    _instance = config;
    config._applyLogging();
    return config;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): TermscrollConfig {
    return _instance ?? this.init();
  }

  static isInitialized(): boolean {
    return _instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
    configureLogging(undefined);
  }

  private static _loadConfigFile(): Record<string, unknown> {
    const configPath = getConfigFilePath();
    let content: string;
    try {
      content = readFileSync(configPath, 'utf8');
    } catch {
      // No config file
      return {};
    }
    try {
      const parsed: unknown = JSON.parse(content);
      if (isRecord(parsed)) return parsed;
      logger.warn('Config file is not a JSON object', { path: configPath });
    } catch (error) {
      logger.warn('Config file is not valid JSON', { path: configPath, error: ensureError(error).message });
    }
    return {};
  }

  static getSchema(): ConfigSchema {
    return SCHEMA;
  }

  /**
   * Current config formatted as text, one `key = value` line per schema key
   */
  static getConfigText(): string {
    const instance = this.get();
    const lines: string[] = ['termscroll configuration', `Config file: ${getConfigFilePath()}`, ''];
    for (const [path, prop] of Object.entries(SCHEMA.properties)) {
      const value = instance._data[path];
      const source = instance._sources[path];
      const displayValue = value === undefined ? '(not set)' : String(value);
      const sourceStr = source === 'env' && prop.env ? ` <- ${prop.env}` : source === 'default' ? '' : ` <- ${source}`;
      lines.push(`${path} = ${displayValue}${sourceStr}`);
    }
    return lines.join('\n');
  }

  // ============================================================================
  // Generic getters
  // ============================================================================

  getString(key: string, defaultValue: string): string {
    const value = this._data[key];
    if (value === undefined || value === null) return defaultValue;
    return String(value);
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this._data[key];
    if (typeof value === 'number' && !Number.isNaN(value)) return value;
    return defaultValue;
  }

  getValue(key: string): unknown {
    return this._data[key];
  }

  getSource(key: string): ConfigSource | undefined {
    return this._sources[key];
  }

  /**
   * Set a config value at runtime. Strings are coerced to the schema type.
   */
  setValue(key: string, value: unknown): void {
    const oldValue = this._data[key];
    const coerced = this._coerce(key, value);
    this._data[key] = coerced;
    this._sources[key] = 'runtime';
    logger.info(`Config updated: ${key} = ${JSON.stringify(coerced)} (was: ${JSON.stringify(oldValue)})`);
    if (key.startsWith('log.')) {
      this._applyLogging();
    }
  }

  private _applyLogging(): void {
    configureLogging({ level: this.logLevel, logFile: this.logFile });
  }

  private _getEnum<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this._data[key];
    return allowed.find((candidate) => candidate === value) ?? fallback;
  }

  // ============================================================================
  // Typed getters
  // ============================================================================

  get theme(): string {
    return this.getString('theme', 'auto');
  }

  get unicode(): UnicodeSetting {
    return this._getEnum('unicode', ['auto', 'full', 'basic', 'ascii'], 'auto');
  }

  get logLevel(): string {
    return this.getString('log.level', 'INFO');
  }

  get logFile(): string | undefined {
    const value = this._data['log.file'];
    return typeof value === 'string' ? value : undefined;
  }

  get wheelStep(): number {
    return this.getNumber('scroll.wheelStep', 3);
  }

  get scrollbarPolicy(): ScrollbarPolicySetting {
    return this._getEnum('scrollbar.policy', ['never', 'always', 'as-needed'], 'as-needed');
  }

  get highlightSymbol(): string {
    return this.getString('list.highlightSymbol', '> ');
  }

  get treeGuideStyle(): GuideStyleSetting {
    return this._getEnum('tree.guideStyle', ['unicode', 'ascii', 'bold', 'double', 'none'], 'unicode');
  }

  get treeIndentWidth(): number {
    return this.getNumber('tree.indentWidth', 2);
  }
}
