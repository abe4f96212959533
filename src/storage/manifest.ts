/**
 * File-based manifest loading: finds, parses and validates `buildgraph.yaml`.
 */

import { readFileSync, existsSync } from 'fs';
import { join, dirname, resolve } from 'path';
import { parse } from 'yaml';
import type { ZodIssue } from 'zod';
import type {
  Expression,
  PresetDeclaration,
  RequirementSetDeclaration,
  TargetDeclaration,
} from '../core/types.js';
import { ExpressionSyntaxError, ManifestError, UnknownContextKeyError } from '../core/errors.js';
import { BuildEngine } from '../core/engine.js';
import { MANIFEST_FILE, type BuildGraphConfig } from '../core/config.js';
import { parseCondition } from '../expr/parse.js';
import { literal, when } from '../expr/evaluate.js';
import {
  ManifestSchema,
  type EntryInput,
  type PresetInput,
  type RequirementSetInput,
  type TargetInput,
} from './schema.js';

export interface Manifest {
  file: string;
  settings: { maxPresetDepth?: number };
  presets: PresetDeclaration[];
  targets: TargetDeclaration[];
}

/**
 * Find the directory holding the manifest by walking up from `startDir`.
 */
export function findManifest(
  startDir: string = process.cwd(),
  fileName: string = MANIFEST_FILE
): string | null {
  let dir = resolve(startDir);
  while (true) {
    const candidate = join(dir, fileName);
    if (existsSync(candidate)) {
      return candidate;
    }
    if (dir === dirname(dir)) return null;
    dir = dirname(dir);
  }
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${path}: ${issue.message}`;
}

class EntryConverter {
  readonly issues: string[] = [];

  entry(input: EntryInput, path: string): Expression {
    if (typeof input === 'string') return literal(input);
    if (input.when === undefined) return literal(input.value);

    try {
      return when(parseCondition(input.when), input.value);
    } catch (error) {
      if (error instanceof ExpressionSyntaxError || error instanceof UnknownContextKeyError) {
        this.issues.push(`${path}.when: ${error.message}`);
        return literal(input.value);
      }
      throw error;
    }
  }

  set(input: RequirementSetInput | undefined, path: string): RequirementSetDeclaration | undefined {
    if (!input) return undefined;
    return {
      includeDirs: input.includeDirs?.map((e, i) => this.entry(e, `${path}.includeDirs.${i}`)),
      definitions: input.definitions?.map((e, i) => this.entry(e, `${path}.definitions.${i}`)),
      options: input.options?.map((e, i) => this.entry(e, `${path}.options.${i}`)),
      links: input.links,
    };
  }

  target(input: TargetInput, index: number): TargetDeclaration {
    const path = `targets.${index}`;
    return {
      name: input.name,
      kind: input.kind,
      sources: input.sources,
      private: this.set(input.private, `${path}.private`),
      public: this.set(input.public, `${path}.public`),
      interface: this.set(input.interface, `${path}.interface`),
    };
  }
}

function toPreset(input: PresetInput): PresetDeclaration {
  return {
    name: input.name,
    inherits: input.inherits,
    description: input.description,
    hidden: input.hidden,
    context: input.context,
    variables: input.variables,
  };
}

/**
 * Validate manifest text and turn it into declarations. Condition strings are parsed here.
 */
export function parseManifest(text: string, file: string = MANIFEST_FILE): Manifest {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ManifestError(file, [message]);
  }

  const result = ManifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ManifestError(file, result.error.issues.map(formatIssue));
  }

  const converter = new EntryConverter();
  const targets = result.data.targets.map((target, index) => converter.target(target, index));
  if (converter.issues.length > 0) {
    throw new ManifestError(file, converter.issues);
  }

  return {
    file,
    settings: result.data.settings,
    presets: result.data.presets.map(toPreset),
    targets,
  };
}

export function loadManifest(filePath: string): Manifest {
  const content = readFileSync(filePath, 'utf-8');
  return parseManifest(content, filePath);
}

/**
 * Build an engine holding every preset and target of the manifest.
 */
export function createEngine(
  manifest: Manifest,
  config?: Pick<BuildGraphConfig, 'maxPresetDepth'>
): BuildEngine {
  const engine = new BuildEngine({
    maxPresetDepth: manifest.settings.maxPresetDepth ?? config?.maxPresetDepth,
  });

  for (const preset of manifest.presets) {
    engine.registerPreset(preset);
  }
  for (const target of manifest.targets) {
    engine.registerTarget(target);
  }

  return engine;
}
