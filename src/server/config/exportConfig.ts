/**
 * Export configuration
 *
 * Values come from CLI arguments first, then environment variables (a local
 * .env file is loaded through dotenv), then defaults. The merged result is
 * validated with Zod.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';

export const exportConfigSchema = z.object({
  inputPath: z.string().trim().min(1, 'Input archive path is required'),
  outputDir: z.string().trim().min(1, 'Output directory must not be empty').default('.'),
  delimiter: z
    .string()
    .length(1, 'Delimiter must be a single character')
    .refine((value) => value !== '"' && value !== '\n' && value !== '\r', {
      message: 'Delimiter cannot be a quote or line break',
    })
    .default(','),
  documentExtension: z
    .string()
    .regex(/^\.[A-Za-z0-9]+$/, 'Document extension must look like ".kml"')
    .default('.kml'),
  dropUnclassified: z.boolean().default(false),
});

export type ExportConfig = z.infer<typeof exportConfigSchema>;
export type ExportConfigInput = z.input<typeof exportConfigSchema>;

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  return value === 'true' || value === '1';
}

/**
 * Settings taken from the environment; unset or empty variables stay undefined
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ExportConfigInput> {
  return {
    inputPath: env.KMZ_INPUT_PATH || undefined,
    outputDir: env.KMZ_OUTPUT_DIR || undefined,
    delimiter: env.CSV_DELIMITER || undefined,
    documentExtension: env.KMZ_DOCUMENT_EXTENSION || undefined,
    dropUnclassified: parseBooleanEnv(env.KMZ_DROP_UNCLASSIFIED),
  };
}

/**
 * Merge overrides over the environment and validate
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadExportConfig(
  overrides: Partial<ExportConfigInput> = {},
  env: NodeJS.ProcessEnv = process.env
): ExportConfig {
  const fromEnv = configFromEnv(env);
  const result = exportConfigSchema.safeParse({
    inputPath: overrides.inputPath ?? fromEnv.inputPath,
    outputDir: overrides.outputDir ?? fromEnv.outputDir,
    delimiter: overrides.delimiter ?? fromEnv.delimiter,
    documentExtension: overrides.documentExtension ?? fromEnv.documentExtension,
    dropUnclassified: overrides.dropUnclassified ?? fromEnv.dropUnclassified,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  return result.data;
}
