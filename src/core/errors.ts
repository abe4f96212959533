/**
 * Typed failures raised by the resolution engine and its collaborators.
 */

import { logger } from './logger.js';

export enum ErrorCodes {
  DUPLICATE_TARGET = 'DUPLICATE_TARGET',
  INVALID_TARGET = 'INVALID_TARGET',
  UNKNOWN_TARGET = 'UNKNOWN_TARGET',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',
  UNKNOWN_CONTEXT_KEY = 'UNKNOWN_CONTEXT_KEY',
  UNSET_CONTEXT_KEY = 'UNSET_CONTEXT_KEY',
  EXPRESSION_SYNTAX = 'EXPRESSION_SYNTAX',
  DUPLICATE_PRESET = 'DUPLICATE_PRESET',
  INVALID_PRESET = 'INVALID_PRESET',
  UNKNOWN_PRESET = 'UNKNOWN_PRESET',
  PRESET_CYCLE = 'PRESET_CYCLE',
  PRESET_CHAIN_TOO_DEEP = 'PRESET_CHAIN_TOO_DEEP',
  MANIFEST_ERROR = 'MANIFEST_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export type ErrorDetails = Readonly<Record<string, unknown>>;

export class BuildGraphError extends Error {
  public readonly code: ErrorCodes;
  public readonly details: ErrorDetails;

  constructor(message: string, code: ErrorCodes, details: ErrorDetails = {}) {
    super(message);
    this.name = 'BuildGraphError';
    this.code = code;
    this.details = details;
  }
}

export class DuplicateTargetError extends BuildGraphError {
  constructor(public readonly targetName: string) {
    super(`Target '${targetName}' is already registered`, ErrorCodes.DUPLICATE_TARGET, {
      targetName,
    });
    this.name = 'DuplicateTargetError';
  }
}

export class InvalidTargetError extends BuildGraphError {
  constructor(
    public readonly targetName: string,
    reason: string
  ) {
    super(`Invalid target '${targetName}': ${reason}`, ErrorCodes.INVALID_TARGET, {
      targetName,
      reason,
    });
    this.name = 'InvalidTargetError';
  }
}

export class UnknownTargetError extends BuildGraphError {
  constructor(
    public readonly targetName: string,
    public readonly referencedBy?: string
  ) {
    const suffix = referencedBy ? ` (required by '${referencedBy}')` : '';
    super(`Unknown target '${targetName}'${suffix}`, ErrorCodes.UNKNOWN_TARGET, {
      targetName,
      referencedBy,
    });
    this.name = 'UnknownTargetError';
  }
}

export class DependencyCycleError extends BuildGraphError {
  constructor(public readonly cycle: readonly string[]) {
    super(`Dependency cycle: ${cycle.join(' → ')}`, ErrorCodes.DEPENDENCY_CYCLE, { cycle });
    this.name = 'DependencyCycleError';
  }
}

export class UnknownContextKeyError extends BuildGraphError {
  constructor(public readonly key: string) {
    super(`Unknown context key '${key}'`, ErrorCodes.UNKNOWN_CONTEXT_KEY, { key });
    this.name = 'UnknownContextKeyError';
  }
}

export class UnsetContextKeyError extends BuildGraphError {
  constructor(public readonly key: string) {
    super(
      `Context key '${key}' is not set; select a preset or pass it explicitly`,
      ErrorCodes.UNSET_CONTEXT_KEY,
      { key }
    );
    this.name = 'UnsetContextKeyError';
  }
}

export class ExpressionSyntaxError extends BuildGraphError {
  constructor(
    public readonly source: string,
    public readonly position: number,
    reason: string
  ) {
    super(
      `Invalid condition '${source}' at column ${position + 1}: ${reason}`,
      ErrorCodes.EXPRESSION_SYNTAX,
      { source, position, reason }
    );
    this.name = 'ExpressionSyntaxError';
  }
}

export class DuplicatePresetError extends BuildGraphError {
  constructor(public readonly presetName: string) {
    super(`Preset '${presetName}' is already registered`, ErrorCodes.DUPLICATE_PRESET, {
      presetName,
    });
    this.name = 'DuplicatePresetError';
  }
}

export class InvalidPresetError extends BuildGraphError {
  constructor(
    public readonly presetName: string,
    reason: string
  ) {
    super(`Invalid preset '${presetName}': ${reason}`, ErrorCodes.INVALID_PRESET, {
      presetName,
      reason,
    });
    this.name = 'InvalidPresetError';
  }
}

export class UnknownPresetError extends BuildGraphError {
  constructor(
    public readonly presetName: string,
    public readonly inheritedBy?: string
  ) {
    const suffix = inheritedBy ? ` (inherited by '${inheritedBy}')` : '';
    super(`Unknown preset '${presetName}'${suffix}`, ErrorCodes.UNKNOWN_PRESET, {
      presetName,
      inheritedBy,
    });
    this.name = 'UnknownPresetError';
  }
}

export class PresetCycleError extends BuildGraphError {
  constructor(public readonly cycle: readonly string[]) {
    super(`Preset inheritance cycle: ${cycle.join(' → ')}`, ErrorCodes.PRESET_CYCLE, { cycle });
    this.name = 'PresetCycleError';
  }
}

export class PresetChainTooDeepError extends BuildGraphError {
  constructor(
    public readonly presetName: string,
    public readonly maxDepth: number
  ) {
    super(
      `Preset '${presetName}' inherits through more than ${maxDepth} presets`,
      ErrorCodes.PRESET_CHAIN_TOO_DEEP,
      { presetName, maxDepth }
    );
    this.name = 'PresetChainTooDeepError';
  }
}

export class ManifestError extends BuildGraphError {
  constructor(
    public readonly file: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid manifest ${file}:\n  ${issues.join('\n  ')}`, ErrorCodes.MANIFEST_ERROR, {
      file,
      issues,
    });
    this.name = 'ManifestError';
  }
}

export class ConfigError extends BuildGraphError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export interface CommandResult {
  success: boolean;
  error?: string;
}

/**
 * Turn any thrown value into a command result, logging the detail at debug level.
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof BuildGraphError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return { success: false, error: error.message };
  }
  if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return { success: false, error: error.message };
  }
  logger.debug('Unknown error occurred', { error });
  return { success: false, error: 'An unknown error occurred' };
}
