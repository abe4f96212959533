/**
 * Command implementations behind the CLI. Each returns the text to print.
 */

import type { BuildContext, ContextOverrides } from '../core/types.js';
import { CONFIGURATIONS } from '../core/types.js';
import type { BuildEngine } from '../core/engine.js';
import { ConfigError, InvalidPresetError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { EMPTY_CONTEXT, applyOverrides, unsetKeys } from '../presets/resolve.js';
import {
  isPlanFormat,
  renderPlan,
  renderPreset,
  renderResolvedTarget,
  PLAN_FORMATS,
} from '../export/render.js';

export interface ContextOptions {
  preset?: string;
  config?: string;
  platform?: string;
  compiler?: string;
}

export interface PlanOptions extends ContextOptions {
  format?: string;
}

/**
 * Context from an optional preset plus explicit overrides. Hidden presets cannot be selected.
 */
export function selectContext(engine: BuildEngine, options: ContextOptions): BuildContext {
  let context = EMPTY_CONTEXT;

  if (options.preset) {
    if (engine.presets.lookup(options.preset).hidden) {
      throw new InvalidPresetError(options.preset, 'hidden presets can only be inherited');
    }
    context = engine.resolvePreset(options.preset);
  }

  const configurations: readonly string[] = CONFIGURATIONS;
  if (options.config !== undefined && !configurations.includes(options.config)) {
    throw new ConfigError(
      `--config must be one of ${CONFIGURATIONS.join(', ')}, got '${options.config}'`,
      { config: options.config }
    );
  }

  const overrides: ContextOverrides = {
    configuration: options.config,
    platform: options.platform,
    compiler: options.compiler,
  };
  context = applyOverrides(context, overrides);

  const unset = unsetKeys(context);
  if (unset.length > 0) {
    logger.warn(`Context leaves ${unset.join(', ')} unset; conditions reading them will fail`);
  }
  return context;
}

export function planCommand(
  engine: BuildEngine,
  targets: readonly string[],
  options: PlanOptions
): string {
  const format = options.format ?? 'text';
  if (!isPlanFormat(format)) {
    throw new ConfigError(`--format must be one of ${PLAN_FORMATS.join(', ')}, got '${format}'`, {
      format,
    });
  }

  const context = selectContext(engine, options);
  return renderPlan(engine.buildPlan(targets, context), format);
}

export function targetsCommand(engine: BuildEngine): string {
  const lines: string[] = [];
  for (const name of engine.targets.allNames()) {
    const target = engine.targets.lookup(name);
    const dependencies = engine.targets.dependencies(name).map((edge) => edge.to);
    const suffix = dependencies.length > 0 ? ` -> ${dependencies.join(', ')}` : '';
    lines.push(`${name} (${target.kind})${suffix}`);
  }
  return lines.join('\n');
}

export function describeCommand(engine: BuildEngine, name: string): string {
  return renderResolvedTarget(engine.describeTarget(name));
}

export function presetsCommand(engine: BuildEngine, options: { all?: boolean } = {}): string {
  return engine.presets
    .names({ includeHidden: options.all })
    .map((name) => {
      const preset = engine.presets.lookup(name);
      const tags = [
        preset.inherits ? `inherits ${preset.inherits}` : null,
        preset.hidden ? 'hidden' : null,
      ].filter((tag): tag is string => tag !== null);
      const head = tags.length > 0 ? `${name} (${tags.join(', ')})` : name;
      return preset.description ? `${head} - ${preset.description}` : head;
    })
    .join('\n');
}

export function contextCommand(engine: BuildEngine, presetName: string): string {
  return renderPreset(engine.resolvePresetDetailed(presetName));
}
