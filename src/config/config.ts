/**
 * Configuration Management
 *
 * Handles loading, validation, and path resolution for engine configuration.
 * Every threshold has a default; a config file only overrides what it names.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  type EngineConfig,
  type EngineConfigInput,
  EngineConfigSchema,
  type Result,
  ok,
  err,
} from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_BASE_DIR = path.join(os.homedir(), '.ladder');
export const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getConfigPath(): string {
  return process.env.LADDER_CONFIG ?? path.join(DEFAULT_BASE_DIR, DEFAULT_CONFIG_FILE);
}

export function getHealingLogPath(config: EngineConfig = DEFAULT_CONFIG): string {
  return expandPath(config.healing.log_file);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Validate a partial configuration against the schema, filling defaults.
 */
export function resolveConfig(overrides: EngineConfigInput = {}): Result<EngineConfig, Error> {
  const result = EngineConfigSchema.safeParse(overrides);
  if (!result.success) {
    return err(new Error(`Invalid configuration: ${result.error.message}`));
  }
  return ok(result.data);
}

/**
 * Load configuration from file, merge with defaults.
 * A missing file is not an error: the defaults apply.
 */
export function loadConfig(customPath?: string): Result<EngineConfig, Error> {
  try {
    const expandedPath = expandPath(customPath ?? getConfigPath());

    let userConfig: unknown = {};
    if (fs.existsSync(expandedPath)) {
      const content = fs.readFileSync(expandedPath, 'utf-8');
      userConfig = JSON.parse(content);
    }

    if (!isPlainObject(userConfig)) {
      return err(new Error(`Invalid configuration: ${expandedPath} must contain a JSON object`));
    }

    const merged = deepMerge({ ...DEFAULT_CONFIG }, userConfig);
    const result = EngineConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

export function saveConfig(config: EngineConfig, customPath?: string): Result<void, Error> {
  try {
    const expandedPath = expandPath(customPath ?? getConfigPath());
    const dir = path.dirname(expandedPath);

    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(expandedPath, JSON.stringify(config, null, 2), {
      mode: 0o600,
      encoding: 'utf-8',
    });

    return ok(undefined);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function reloadConfig(): Result<EngineConfig, Error> {
  clearConfigCache();
  const result = loadConfig();
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}
