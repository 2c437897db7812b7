/**
 * AnalysisContext - configured collaborators for one project
 *
 * Loads .depweave config and builds the logger, analyzer and path adjuster
 * the module-resolution layer works with.
 */

import { resolve } from 'path';
import { InstructionAnalyzer } from './bytecode/InstructionAnalyzer.js';
import { loadConfig, type DepweaveConfig } from './config/ConfigLoader.js';
import { createLogger, type Logger, type LogLevel } from './logging/Logger.js';
import { createPathAdjuster, type PathAdjuster } from './paths/VirtualenvPathAdjuster.js';

export interface AnalysisContext {
  projectPath: string;
  config: DepweaveConfig;
  logger: Logger;
  analyzer: InstructionAnalyzer;
  adjustPath: PathAdjuster;
}

export interface AnalysisContextOptions {
  /** Overrides config.logLevel (e.g. from a --verbose flag) */
  logLevel?: LogLevel;
  /** Use this logger instead of building one from config */
  logger?: Logger;
}

export function createAnalysisContext(projectPath: string, options: AnalysisContextOptions = {}): AnalysisContext {
  const root = resolve(projectPath);
  const config = loadConfig(root, options.logger);

  const logger = options.logger ?? createLogger(
    options.logLevel ?? config.logLevel,
    config.logFile ? { logFile: resolve(root, config.logFile) } : undefined,
  );

  if (config.virtualenv) {
    logger.debug('Adjusting paths for virtualenv', { prefix: config.virtualenv.prefix });
  }

  return {
    projectPath: root,
    config,
    logger,
    analyzer: new InstructionAnalyzer({ logger }),
    adjustPath: createPathAdjuster(config.virtualenv, logger),
  };
}
