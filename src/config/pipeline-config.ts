import { z } from 'zod';
import { ConfigError } from '../errors/config-error';
import type { JSONSchema } from '../jsonschema/types';
import { SecureYAMLLoader } from '../loaders/yaml-loader';
import { DEFAULT_MAX_INPUT_BYTES } from '../validation/decoders';
import { formatZodError } from '../validation/errors';

const PositiveInteger = z
  .number({
    invalid_type_error: 'Value must be a number',
  })
  .int('Value must be an integer')
  .positive('Value must be positive');

export const PipelineConfigSchema = z
  .object({
    format: z.enum(['json', 'yaml']).default('json'),
    schemaCheck: z.boolean().default(true),
    maxInputBytes: PositiveInteger.max(64 * 1024 * 1024).default(DEFAULT_MAX_INPUT_BYTES), // 64MB hard limit
  })
  .strict();

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

/**
 * Structural check applied by the loader before the config is resolved.
 */
export const PIPELINE_CONFIG_FILE_SCHEMA: JSONSchema = {
  type: ['object', 'null'],
  properties: {
    format: { enum: ['json', 'yaml'] },
    schemaCheck: { type: 'boolean' },
    maxInputBytes: { type: 'integer' },
  },
  additionalProperties: false,
};

/**
 * @throws ConfigError listing every formatted issue
 */
export function resolvePipelineConfig(input: unknown = {}): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigError(`Invalid pipeline configuration: ${issues.join('; ')}`, {
      cause: result.error,
      context: { data: { issues } },
    });
  }
  return result.data;
}

/**
 * An empty file resolves to the defaults.
 */
export async function loadPipelineConfig(filePath: string, baseDir: string): Promise<PipelineConfig> {
  const loader = new SecureYAMLLoader({ baseDir });
  const raw = await loader.load(filePath, PIPELINE_CONFIG_FILE_SCHEMA);
  return resolvePipelineConfig(raw ?? {});
}
