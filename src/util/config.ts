import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import { ConfigError, errorMessage } from './errors';

// --- Zod Schemas ---

export const OutputFormatSchema = z.enum(['jsonl', 'json']);

const MalIdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

const CheckpointSchema = z.object({
  path: z.string().min(1),
  saveInterval: z.number().int().positive().default(10),
  resume: z.boolean().default(true),
});

const ConfigSchema = z.preprocess(
  // Accept the snake_case keys of older config files
  raw => {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;
    const { mal_ids, people_ids, output_path, ...rest }: Record<string, unknown> = { ...raw };
    return {
      ...(mal_ids !== undefined ? { malIds: mal_ids } : {}),
      ...(people_ids !== undefined ? { peopleIds: people_ids } : {}),
      ...(output_path !== undefined ? { outputPath: output_path } : {}),
      ...rest,
    };
  },
  z.object({
    malIds: z.array(MalIdSchema).default([]),
    peopleIds: z.array(MalIdSchema).default([]),
    outputPath: z.string().min(1).optional(),
    format: OutputFormatSchema.optional(),
    concurrency: z.number().int().positive().max(50).optional(),
    checkpoint: CheckpointSchema.optional(),
  }).strict()
);

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type CheckpointConfig = z.infer<typeof CheckpointSchema>;

// --- Loader Logic ---

export interface LoadConfigOptions {
  /** Fail when the file does not exist, instead of falling back to defaults. */
  required?: boolean;
}

export function parseConfig(raw: unknown, source: string): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(err => `${err.path.join('.') || '(root)'}: ${err.message}`);
    logger.error(`Configuration validation failed for ${source}:`);
    issues.forEach(issue => logger.error(`- ${issue}`));
    throw new ConfigError(`Invalid configuration in ${source}`, issues);
  }
  return result.data;
}

export function loadConfig(configPath: string, options: LoadConfigOptions = {}): Config {
  const resolved = path.resolve(process.cwd(), configPath);

  if (!fs.existsSync(resolved)) {
    if (options.required) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    logger.info(`No config file at ${resolved}. Using defaults.`);
    return parseConfig({}, 'defaults');
  }

  logger.info(`Loading configuration from ${resolved}`);
  let loaded: unknown;
  try {
    loaded = yaml.load(fs.readFileSync(resolved, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Failed to parse ${resolved}: ${errorMessage(e)}`);
  }

  return parseConfig(loaded, resolved);
}
