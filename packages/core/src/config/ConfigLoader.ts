import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError } from '../errors/DepweaveError.js';
import { isLogLevel, type LogLevel } from '../logging/Logger.js';
import type { VirtualenvLayout } from '../paths/VirtualenvPathAdjuster.js';
import { DEPWEAVE_VERSION, getSchemaVersion } from '../version.js';

/**
 * depweave configuration schema.
 *
 * Location: .depweave/config.yaml (preferred) or .depweave/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.1.0"
 * logLevel: info
 * logFile: .depweave/analysis.log
 *
 * # Map the environment's stdlib back to the real installation
 * virtualenv:
 *   prefix: /work/venv
 *   realPrefix: /usr
 *   libDir: lib/python3.12
 * ```
 */
export interface DepweaveConfig {
  /**
   * Config schema version (major.minor.patch). If omitted, no check is done.
   */
  version?: string;

  logLevel: LogLevel;

  /** Also write logs (at debug level) to this file, relative to the project root */
  logFile?: string;

  /** Set when analyzing modules of a virtual environment */
  virtualenv?: VirtualenvLayout;
}

export const DEFAULT_CONFIG: DepweaveConfig = {
  version: getSchemaVersion(DEPWEAVE_VERSION),
  logLevel: 'warnings',
};

interface WarnSink {
  warn: (msg: string) => void;
}

/**
 * Load depweave config from a project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (deprecated, fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Files that fail to parse log a warning and yield defaults. Files that parse
 * but hold invalid values throw ConfigError.
 */
export function loadConfig(projectPath: string, logger: WarnSink = console): DepweaveConfig {
  const configDir = join(projectPath, '.depweave');
  const yamlPath = join(configDir, 'config.yaml');
  const jsonPath = join(configDir, 'config.json');

  if (existsSync(yamlPath)) {
    const parsed = parseFile(yamlPath, 'config.yaml', parseYAML, logger);
    return parsed === undefined ? DEFAULT_CONFIG : validateConfig(parsed, yamlPath);
  }

  if (existsSync(jsonPath)) {
    logger.warn('config.json is deprecated, move its contents to .depweave/config.yaml');
    const parsed = parseFile(jsonPath, 'config.json', JSON.parse, logger);
    return parsed === undefined ? DEFAULT_CONFIG : validateConfig(parsed, jsonPath);
  }

  return DEFAULT_CONFIG;
}

/**
 * Returns undefined (after warning) when the file cannot be parsed.
 */
function parseFile(
  filePath: string,
  label: string,
  parse: (content: string) => unknown,
  logger: WarnSink,
): unknown {
  try {
    // An empty or comment-only YAML file parses to null; treat it as {}
    return parse(readFileSync(filePath, 'utf-8')) ?? {};
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse ${label}: ${error.message}`);
    logger.warn('Using default configuration');
    return undefined;
  }
}

/**
 * Validate parsed config contents and merge them over the defaults.
 *
 * @throws ConfigError on invalid values
 */
export function validateConfig(parsed: unknown, filePath?: string): DepweaveConfig {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Config error: config must be a mapping', { filePath });
  }

  const raw: Record<string, unknown> = { ...parsed };

  validateVersion(raw.version);

  const config: DepweaveConfig = { ...DEFAULT_CONFIG };

  if (typeof raw.version === 'string') {
    config.version = raw.version;
  }

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(
        `Config error: logLevel must be one of silent, errors, warnings, info, debug, got ${JSON.stringify(raw.logLevel)}`,
        { filePath },
      );
    }
    config.logLevel = raw.logLevel;
  }

  if (raw.logFile !== undefined) {
    if (typeof raw.logFile !== 'string' || !raw.logFile.trim()) {
      throw new ConfigError('Config error: logFile must be a non-empty string', { filePath });
    }
    config.logFile = raw.logFile;
  }

  const virtualenv = validateVirtualenv(raw.virtualenv, filePath);
  if (virtualenv) {
    config.virtualenv = virtualenv;
  }

  return config;
}

/**
 * Validate config version compatibility with the running version.
 * No version field passes silently.
 *
 * @throws ConfigError if the schema versions differ
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? DEPWEAVE_VERSION;
  const currentSchema = getSchemaVersion(current);

  if (getSchemaVersion(configVersion) !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
      `depweave ${current}. Expected "${currentSchema}".`,
      { configVersion, currentVersion: current },
    );
  }
}

/**
 * Validate the virtualenv section: an object of three non-empty strings.
 * Absent means "not in a virtual environment".
 *
 * @throws ConfigError on missing or non-string fields
 */
export function validateVirtualenv(value: unknown, filePath?: string): VirtualenvLayout | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`Config error: virtualenv must be an object, got ${typeof value}`, { filePath });
  }

  const section: Record<string, unknown> = { ...value };
  const fields = ['prefix', 'realPrefix', 'libDir'] as const;
  const layout: VirtualenvLayout = { prefix: '', realPrefix: '', libDir: '' };

  for (const field of fields) {
    const fieldValue = section[field];
    if (typeof fieldValue !== 'string' || !fieldValue.trim()) {
      throw new ConfigError(`Config error: virtualenv.${field} must be a non-empty string`, { filePath });
    }
    layout[field] = fieldValue;
  }

  if (layout.libDir.startsWith('/')) {
    throw new ConfigError(
      `Config error: virtualenv.libDir must be relative to the prefixes, got "${layout.libDir}"`,
      { filePath },
    );
  }

  return layout;
}
