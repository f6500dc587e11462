import { z } from 'zod';

/**
 * Options as commander hands them over after parsing
 */
export const CliOptionsSchema = z.object({
  verbose: z.number().int().min(0).default(0),
  quiet: z.number().int().min(0).default(0),
  color: z.boolean().default(true),
  usage: z.boolean().optional(),
  help: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * The only part of package.json the CLI reads
 */
export const PackageJsonSchema = z.object({
  version: z.string().min(1),
});
