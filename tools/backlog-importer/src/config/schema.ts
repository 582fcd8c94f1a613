import { z } from 'zod';

const jiraConfigSchema = z.object({
  reading_script: z.string().min(1).nullable().optional(),
  writing_script: z.string().min(1).nullable().optional(),
  project: z.string().min(1).nullable().optional(),
});

const claudeConfigSchema = z.object({
  model: z.string().min(1),
  fallback: z.boolean(),
});

const gateConfigSchema = z.object({
  min_lines: z.number().int().nonnegative(),
  min_issues: z.number().int().nonnegative(),
  min_description_length: z.number().int().nonnegative(),
});

export const importerConfigSchema = z.object({
  jira: jiraConfigSchema,
  claude: claudeConfigSchema,
  parser: z.object({
    gate: gateConfigSchema,
  }),
});

/**
 * Shape of a global or repo config file: every section and key optional,
 * filled in from the layer below when merged.
 */
export const importerConfigOverrideSchema = z
  .object({
    jira: jiraConfigSchema.nullable().optional(),
    claude: claudeConfigSchema.partial().nullable().optional(),
    parser: z
      .object({
        gate: gateConfigSchema.partial().nullable().optional(),
      })
      .nullable()
      .optional(),
  })
  .nullable();

export type ValidatedImporterConfig = z.infer<typeof importerConfigSchema>;
export type ImporterConfigOverride = z.infer<typeof importerConfigOverrideSchema>;
