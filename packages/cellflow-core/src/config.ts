/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * cellflow configuration.
 *
 * Read from CELLFLOW_CONFIG if set, otherwise ~/.cellflow/config.json.
 * A missing file yields the defaults. CELLFLOW_HOME overrides `home`.
 * Relative `planners` modules are resolved against the config file's directory.
 *
 * @example
 * ```json
 * {
 *   "monitoringInterval": 10,
 *   "submitCap": 500,
 *   "planners": ["./planners/jterator.js"],
 *   "run": { "walltime": "01:00:00", "memory": 2000, "cores": 1 }
 * }
 * ```
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, isNotFoundError } from './errors.js';

const WalltimeSchema = z.string().regex(/^\d+:[0-5]\d:[0-5]\d$/, 'must have the format HH:MM:SS');

const ResourceSchema = z.object({
  walltime: WalltimeSchema.optional(),
  memory: z.number().int().positive().optional(),
  cores: z.number().int().positive().optional(),
});

export const ConfigSchema = z.object({
  home: z.string().optional(),
  monitoringInterval: z.number().positive().default(5),
  submitCap: z.number().int().positive().default(2000),
  verbosity: z.number().int().min(0).default(0),
  /** Modules registering step planners */
  planners: z.array(z.string().min(1)).default([]),
  /** Command prefix of every job, followed by `<step> [-v...] <experiment> ...` */
  launcher: z.array(z.string().min(1)).default(['cellflow']),
  run: ResourceSchema.default({}),
  collect: ResourceSchema.default({}).transform((collect) => ({
    ...collect,
    walltime: collect.walltime ?? '02:00:00',
    memory: collect.memory ?? 4000,
  })),
});

export type CellflowConfig = Omit<z.output<typeof ConfigSchema>, 'home'> & { home: string };

/** Default cellflow home directory */
export function defaultHome(): string {
  return path.join(os.homedir(), '.cellflow');
}

/**
 * Get path to the config file.
 * Uses CELLFLOW_CONFIG env var if set, otherwise ~/.cellflow/config.json.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CELLFLOW_CONFIG ?? path.join(defaultHome(), 'config.json');
}

/**
 * Validate a parsed config document and apply defaults.
 *
 * @throws {ConfigError} If the document is invalid
 */
export function parseConfig(
  raw: unknown,
  source = '<config>',
  env: NodeJS.ProcessEnv = process.env
): CellflowConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      source,
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }
  const home = env.CELLFLOW_HOME ?? result.data.home ?? defaultHome();
  return { ...result.data, home: path.resolve(home) };
}

/**
 * Load the cellflow configuration.
 *
 * @throws {ConfigError} If the file is not valid JSON or not a valid config
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CellflowConfig {
  const file = getConfigPath(env);
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf8');
  } catch (err) {
    if (isNotFoundError(err)) {
      return parseConfig({}, file, env);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(file, [err instanceof Error ? err.message : String(err)]);
  }
  return parseConfig(raw, file, env);
}
