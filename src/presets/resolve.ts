/**
 * Named, single-inheritance build presets and their resolution into a build context.
 */

import type {
  BuildContext,
  ContextKey,
  ContextOverrides,
  PresetDeclaration,
  ResolvedPreset,
} from '../core/types.js';
import { CONFIGURATIONS, CONTEXT_KEYS } from '../core/types.js';
import {
  ConfigError,
  DuplicatePresetError,
  InvalidPresetError,
  PresetChainTooDeepError,
  PresetCycleError,
  UnknownPresetError,
} from '../core/errors.js';
import { DEFAULT_MAX_PRESET_DEPTH } from '../core/config.js';
import { isContextKey } from '../expr/evaluate.js';

export const EMPTY_CONTEXT: BuildContext = Object.freeze({
  configuration: undefined,
  platform: undefined,
  compiler: undefined,
});

/**
 * Apply overrides key by key; keys the overrides leave out keep their value.
 */
export function applyOverrides(context: BuildContext, overrides: ContextOverrides): BuildContext {
  const merged: Record<ContextKey, string | undefined> = { ...context };
  for (const key of CONTEXT_KEYS) {
    const value = overrides[key];
    if (value !== undefined) merged[key] = value;
  }
  return Object.freeze(merged);
}

/**
 * Context keys the given context leaves unset.
 */
export function unsetKeys(context: BuildContext): string[] {
  return CONTEXT_KEYS.filter((key) => context[key] === undefined);
}

function validate(declaration: PresetDeclaration): void {
  const { name } = declaration;
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new InvalidPresetError(String(name), 'name must be non-empty');
  }

  for (const [key, value] of Object.entries(declaration.context ?? {})) {
    if (!isContextKey(key)) {
      throw new InvalidPresetError(
        name,
        `unknown context key '${key}' (expected one of ${CONTEXT_KEYS.join(', ')})`
      );
    }
    if (key === 'configuration' && value !== undefined) {
      if (!CONFIGURATIONS.some((entry) => entry === value)) {
        throw new InvalidPresetError(
          name,
          `configuration must be one of ${CONFIGURATIONS.join(', ')}, got '${value}'`
        );
      }
    }
  }
}

export interface PresetResolverOptions {
  maxDepth?: number;
}

export class PresetResolver {
  private readonly presets = new Map<string, Readonly<PresetDeclaration>>();
  private readonly maxDepth: number;

  constructor(options: PresetResolverOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_PRESET_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new ConfigError(`maxDepth must be a positive integer, got ${String(maxDepth)}`, {
        maxDepth,
      });
    }
    this.maxDepth = maxDepth;
  }

  register(declaration: PresetDeclaration): void {
    validate(declaration);
    if (this.presets.has(declaration.name)) {
      throw new DuplicatePresetError(declaration.name);
    }

    this.presets.set(
      declaration.name,
      Object.freeze({
        ...declaration,
        context: Object.freeze({ ...declaration.context }),
        variables: Object.freeze({ ...declaration.variables }),
      })
    );
  }

  has(name: string): boolean {
    return this.presets.has(name);
  }

  lookup(name: string): Readonly<PresetDeclaration> {
    const preset = this.presets.get(name);
    if (!preset) {
      throw new UnknownPresetError(name);
    }
    return preset;
  }

  /**
   * Preset names in registration order. Hidden presets are left out unless asked for.
   */
  names(options: { includeHidden?: boolean } = {}): string[] {
    return [...this.presets.values()]
      .filter((preset) => options.includeHidden || !preset.hidden)
      .map((preset) => preset.name);
  }

  /**
   * The preset's inheritance chain, root first.
   */
  chain(name: string): string[] {
    const walked: string[] = [];
    let current: string | undefined = name;
    let child: string | undefined;

    while (current !== undefined) {
      if (walked.includes(current)) {
        throw new PresetCycleError([...walked.slice(walked.indexOf(current)), current]);
      }
      if (walked.length === this.maxDepth) {
        throw new PresetChainTooDeepError(name, this.maxDepth);
      }

      const preset = this.presets.get(current);
      if (!preset) {
        throw new UnknownPresetError(current, child);
      }

      walked.push(current);
      child = current;
      current = preset.inherits;
    }

    return walked.reverse();
  }

  resolve(name: string): BuildContext {
    return this.resolveDetailed(name).context;
  }

  /**
   * Fold the chain root to leaf; a child's entries shadow its ancestors'.
   * Keys no preset assigns stay unset.
   */
  resolveDetailed(name: string): ResolvedPreset {
    const chain = this.chain(name);
    let context = EMPTY_CONTEXT;
    const variables: Record<string, string> = {};

    for (const presetName of chain) {
      const preset = this.lookup(presetName);
      context = applyOverrides(context, preset.context ?? {});
      Object.assign(variables, preset.variables);
    }

    return {
      name,
      chain,
      context,
      variables: Object.freeze(variables),
    };
  }
}
