import { z } from 'zod';
import { Priority } from '@tasktrack/core';

export const ConfigSchema = z.object({
  /** Priority given to tasks added without -p */
  defaultPriority: z.coerce.number().int().min(Priority.Min).max(Priority.Max).default(Priority.Default),
  verbose: z.boolean().default(false),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

/** Values from the command line; each overrides its environment variable */
export interface ConfigFlags {
  defaultPriority?: string;
  verbose?: boolean;
}

export type ConfigLoad =
  | { readonly success: true; readonly config: CliConfig }
  | { readonly success: false; readonly issues: readonly string[] };

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Merge flags over TASKTRACK_* environment variables and validate.
 */
export function loadConfig(flags: ConfigFlags, env: NodeJS.ProcessEnv): ConfigLoad {
  const raw = {
    defaultPriority: flags.defaultPriority ?? (env['TASKTRACK_DEFAULT_PRIORITY'] || undefined),
    verbose: flags.verbose ?? envFlag(env['TASKTRACK_VERBOSE']),
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
  return { success: true, config: parsed.data };
}
