import { z } from 'zod';

export const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

export const OUTPUT_FORMATS = ['json', 'csv'] as const;

export const CliOptionsSchema = z.object({
  inputDir: z.string().min(1).optional(),
  out: z.string().min(1).optional(),
  pretty: z.boolean().default(true),
  sortKeys: z.boolean().default(false),
  format: z.enum(OUTPUT_FORMATS).default('json'),
  strict: z.boolean().default(false),
  verbose: z.boolean().default(false),
  validate: z.boolean().default(false),
  encoding: z.enum(['latin1', 'utf8']).default('latin1'),
  table: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Commander leaves unset options undefined and hands `--format` through as
 * any string; both are settled here.
 */
export function parseCliOptions(raw: unknown): CliOptions {
  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid options: ${issues.join('; ')}`);
  }
  return result.data;
}
