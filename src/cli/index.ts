#!/usr/bin/env node
/**
 * buildgraph CLI - resolve targets and presets from a manifest and print build plans.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, type BuildGraphConfig } from '../core/config.js';
import { ConfigError, handleError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import type { BuildEngine } from '../core/engine.js';
import { createEngine, findManifest, loadManifest } from '../storage/manifest.js';
import {
  contextCommand,
  describeCommand,
  planCommand,
  presetsCommand,
  targetsCommand,
  type PlanOptions,
} from './commands.js';

interface GlobalOptions {
  manifest?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('buildgraph')
  .description('Resolve build targets, usage requirements and presets into build plans')
  .version('0.1.0')
  .option('-m, --manifest <path>', 'Manifest file (default: nearest buildgraph.yaml)')
  .option('-v, --verbose', 'Log resolution details');

/**
 * Print failures in red and exit non-zero instead of throwing out of commander.
 */
function withErrorHandling<T extends unknown[]>(fn: (...args: T) => void): (...args: T) => void {
  return (...args: T): void => {
    try {
      fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(chalk.red(result.error));
      process.exit(1);
    }
  };
}

function openEngine(): BuildEngine {
  const options = program.opts<GlobalOptions>();
  const config: BuildGraphConfig = loadConfig();
  logger.setLevel(options.verbose ? 'debug' : config.logLevel);

  const manifestPath = options.manifest ?? findManifest(process.cwd(), config.manifestFile);
  if (!manifestPath) {
    throw new ConfigError(`No ${config.manifestFile} found in ${process.cwd()} or its parents`);
  }

  logger.debug(`Loading manifest ${manifestPath}`);
  return createEngine(loadManifest(manifestPath), config);
}

// Plan command
program
  .command('plan [targets...]')
  .description('Print the build plan for the given targets (all targets when none are given)')
  .option('-p, --preset <name>', 'Preset supplying the build context')
  .option('-c, --config <name>', 'Configuration (Debug, Release, RelWithDebInfo, MinSizeRel)')
  .option('--platform <name>', 'Platform identity')
  .option('--compiler <name>', 'Compiler identity')
  .option('-f, --format <format>', 'Output format (text, json, yaml)', 'text')
  .action(
    withErrorHandling((targets: string[], options: PlanOptions) => {
      console.log(planCommand(openEngine(), targets, options));
    })
  );

// Targets command
program
  .command('targets')
  .description('List registered targets with their direct dependencies')
  .action(
    withErrorHandling(() => {
      const output = targetsCommand(openEngine());
      console.log(output.length > 0 ? output : chalk.yellow('No targets declared'));
    })
  );

// Describe command
program
  .command('describe <target>')
  .description('Show the propagated requirements of a target, conditions unevaluated')
  .action(
    withErrorHandling((target: string) => {
      console.log(describeCommand(openEngine(), target));
    })
  );

// Presets command
program
  .command('presets')
  .description('List presets that can be selected')
  .option('-a, --all', 'Include hidden presets')
  .action(
    withErrorHandling((options: { all?: boolean }) => {
      const output = presetsCommand(openEngine(), options);
      console.log(output.length > 0 ? output : chalk.yellow('No presets declared'));
    })
  );

// Context command
program
  .command('context <preset>')
  .description('Show the build context and variables a preset resolves to')
  .action(
    withErrorHandling((preset: string) => {
      console.log(contextCommand(openEngine(), preset));
    })
  );

program.parse();
