/**
 * Manifest schemas: Zod validation for the YAML project file.
 */

import { z } from 'zod';

/**
 * A requirement entry: a plain value, or a value guarded by a condition string.
 */
export const EntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      value: z.string().min(1),
      when: z.string().min(1).optional(),
    })
    .strict(),
]);
export type EntryInput = z.infer<typeof EntrySchema>;

export const RequirementSetSchema = z
  .object({
    includeDirs: z.array(EntrySchema).optional(),
    definitions: z.array(EntrySchema).optional(),
    options: z.array(EntrySchema).optional(),
    links: z.array(z.string().min(1)).optional(),
  })
  .strict();
export type RequirementSetInput = z.infer<typeof RequirementSetSchema>;

export const TargetSchema = z
  .object({
    name: z.string().min(1),
    kind: z.enum(['executable', 'static-library', 'interface-only']),
    sources: z.array(z.string().min(1)).optional(),
    private: RequirementSetSchema.optional(),
    public: RequirementSetSchema.optional(),
    interface: RequirementSetSchema.optional(),
  })
  .strict();
export type TargetInput = z.infer<typeof TargetSchema>;

export const ContextSchema = z
  .object({
    configuration: z.enum(['Debug', 'Release', 'RelWithDebInfo', 'MinSizeRel']).optional(),
    platform: z.string().min(1).optional(),
    compiler: z.string().min(1).optional(),
  })
  .strict();

export const PresetSchema = z
  .object({
    name: z.string().min(1),
    inherits: z.string().min(1).optional(),
    description: z.string().optional(),
    hidden: z.boolean().optional(),
    context: ContextSchema.optional(),
    // YAML reads ON/1/true unquoted as scalars; variables are always strings
    variables: z
      .record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String))
      .optional(),
  })
  .strict();
export type PresetInput = z.infer<typeof PresetSchema>;

export const SettingsSchema = z
  .object({
    maxPresetDepth: z.number().int().positive().optional(),
  })
  .strict();

export const ManifestSchema = z
  .object({
    settings: SettingsSchema.default({}),
    presets: z.array(PresetSchema).default([]),
    targets: z.array(TargetSchema).default([]),
  })
  .strict();
export type ManifestInput = z.infer<typeof ManifestSchema>;
