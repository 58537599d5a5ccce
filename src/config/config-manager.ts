/**
 * Unified Configuration Loader
 *
 * Loads, merges and validates configuration from the user-level
 * (~/.config/termbars/config.json) and project-level (.termbars/config.json)
 * sources.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '../errors/index.js';
import { getConfigPath, getProjectDir } from '../paths.js';
import { UserConfigSchema, type ValidatedUserConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
  /**
   * Explicit user-level config file. Unlike the default location it must
   * exist and parse, otherwise a ConfigError is thrown.
   */
  configPath?: string;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedUserConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal validation warnings */
  warnings: string[];
}

// =============================================================================
// DEEP MERGE
// =============================================================================

/**
 * Shallow spread with a 1-level nested object merge; arrays replace.
 */
function deepMergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];

    if (isPlainObject(value) && isPlainObject(baseValue)) {
      result[key] = { ...baseValue, ...value };
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON — ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  if (!isPlainObject(parsed)) {
    warnings.push(
      `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
    );
    return null;
  }

  return parsed;
}

/**
 * Load a config file the caller named explicitly.
 *
 * @throws ConfigError when the file is missing or not a JSON object
 */
function loadRequiredJsonFile(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`, filePath);
  }

  const warnings: string[] = [];
  const parsed = loadJsonFile(filePath, warnings);
  if (parsed === null) {
    throw new ConfigError(warnings.join('; '), filePath);
  }
  return parsed;
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: user ← project (project overrides user).
 * Validation issues become warnings and the offending top-level sections
 * are dropped, so a usable config is always returned.
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  // 1. User-level
  const userConfigPath = options.configPath ?? getConfigPath();
  const userRaw = options.configPath
    ? loadRequiredJsonFile(options.configPath)
    : loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  // 2. Project-level
  let projectRaw: Record<string, unknown> | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  // 3. Merge: user ← project
  let merged: Record<string, unknown> = userRaw ? { ...userRaw } : {};
  if (projectRaw) {
    merged = deepMergeConfigs(merged, projectRaw);
  }

  // 4. Validate
  const result = UserConfigSchema.safeParse(merged);
  if (result.success) {
    return { config: result.data, sources, warnings };
  }

  const invalidSections = new Set<string>();
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    warnings.push(`config validation: ${path} — ${issue.message}`);
    if (issue.path.length > 0) {
      invalidSections.add(String(issue.path[0]));
    }
  }

  const pruned = Object.fromEntries(
    Object.entries(merged).filter(([key]) => !invalidSections.has(key)),
  );
  const retry = UserConfigSchema.safeParse(pruned);
  return { config: retry.success ? retry.data : {}, sources, warnings };
}
