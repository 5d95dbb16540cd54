/**
 * reshape.json - pipeline options read from the working directory
 */

import { existsSync, readFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { z } from 'zod';
import type { NormalizeOptions } from '@reshape/passes';

export const DEFAULT_CONFIG_NAME = 'reshape.json';

export const configSchema = z
  .object({
    tieBreakPriority: z.array(z.string().min(1)).optional(),
    reservedWords: z.array(z.string().min(1)).optional(),
    reservedSuffix: z.string().min(1).optional(),
    collectionModules: z.array(z.string().min(1)).optional(),
    discardName: z.string().startsWith('_').optional(),
    pipelineMinDepth: z.number().int().min(2).optional(),
    disabledPasses: z.array(z.string()).optional(),
    verify: z.boolean().optional(),
    trace: z.boolean().optional(),
  })
  .strict();

export type ReshapeConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load options from `explicitPath`, or from reshape.json in `cwd` when it
 * exists. An explicit path that does not exist is an error.
 */
export function loadConfig(cwd: string, explicitPath?: string): NormalizeOptions {
  const configPath = explicitPath ? resolve(cwd, explicitPath) : join(cwd, DEFAULT_CONFIG_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath) throw new ConfigError(`No config file found at ${configPath}`, configPath);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath
    );
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`Invalid ${basename(configPath)}: ${where}${issue ? issue.message : 'invalid value'}`, configPath);
  }
  return result.data;
}
