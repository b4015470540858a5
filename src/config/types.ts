/**
 * Configuration types
 */

import { z } from 'zod';

/**
 * Shape of `tsfix.config.yaml`. Every key is optional.
 */
export const fileConfigSchema = z
  .object({
    /** Fix names to run when `-r` is not given */
    fixes: z.array(z.string().min(1)).optional(),
    /** Extensions picked up when a directory is given, e.g. ".ts" */
    extensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/, 'extension must look like ".ts"')).optional(),
    /** Extra glob patterns to skip inside directories */
    ignore: z.array(z.string().min(1)).optional(),
    /** Fixed-point driver pass cap */
    maxPasses: z.number().int().min(1).max(100).optional(),
  })
  .strict();

export type PartialFixConfig = z.infer<typeof fileConfigSchema>;

/**
 * Resolved configuration for one run.
 */
export interface FixConfig {
  /** Undefined means every registered fix */
  fixes?: string[];
  extensions: string[];
  ignore: string[];
  maxPasses: number;
}

/**
 * Values given on the command line; they take precedence over everything else.
 */
export interface CliConfigOverrides {
  fixes?: string[];
  maxPasses?: number;
}
