/**
 * Runtime configuration read from the environment.
 */

import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

/**
 * Default manifest file name, searched for upward from the working directory.
 */
export const MANIFEST_FILE = 'buildgraph.yaml';

export const DEFAULT_MAX_PRESET_DEPTH = 16;

export interface BuildGraphConfig {
  logLevel: LogLevel;
  manifestFile: string;
  maxPresetDepth: number;
}

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer, got '${raw}'`, { name, raw });
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BuildGraphConfig {
  let logLevel: LogLevel = env.BUILDGRAPH_VERBOSE === '1' ? 'debug' : 'warn';
  const rawLevel = env.BUILDGRAPH_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel !== '') {
    if (!isLogLevel(rawLevel)) {
      throw new ConfigError(
        `BUILDGRAPH_LOG_LEVEL must be one of debug, info, warn, error, got '${rawLevel}'`,
        { name: 'BUILDGRAPH_LOG_LEVEL', raw: rawLevel }
      );
    }
    logLevel = rawLevel;
  }

  const rawDepth = env.BUILDGRAPH_MAX_PRESET_DEPTH;
  const maxPresetDepth =
    rawDepth !== undefined && rawDepth !== ''
      ? parsePositiveInt('BUILDGRAPH_MAX_PRESET_DEPTH', rawDepth)
      : DEFAULT_MAX_PRESET_DEPTH;

  return {
    logLevel,
    manifestFile: env.BUILDGRAPH_MANIFEST || MANIFEST_FILE,
    maxPresetDepth,
  };
}
