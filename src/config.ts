/**
 * Server configuration.
 *
 * Defaults, then config/config.{AYAH_CONFIG}.json (AYAH_CONFIG defaults to
 * "default"), then environment variables, then --port= / --data-dir=
 * command-line arguments.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { z } from 'zod';
import type { DatasetFiles } from './loader.js';

export interface AppConfig {
  /** Port to listen on */
  port: number;
  /** Directory holding the datasets (absolute once loaded) */
  dataDir: string;
  files: DatasetFiles;
  /** Whether POST /api/reload may rebuild the index */
  reloadAllowed: boolean;
  /** Log each HTTP request */
  logRequests: boolean;
  defaultSearchLimit: number;
  maxSearchLimit: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3000,
  dataDir: 'data',
  files: {
    arabic: 'qpc-hafs.json',
    translation: 'en-taqi-usmani-simple.json',
    commentary: 'en-tafisr-ibn-kathir.json'
  },
  reloadAllowed: false,
  logRequests: true,
  defaultSearchLimit: 20,
  maxSearchLimit: 100
};

const portSchema = z.number().int().min(1).max(65535);

const configFileSchema = z.object({
  port: portSchema.optional(),
  dataDir: z.string().min(1).optional(),
  files: z.object({
    arabic: z.string().min(1).optional(),
    translation: z.string().min(1).optional(),
    commentary: z.string().min(1).optional()
  }).strict().optional(),
  reloadAllowed: z.boolean().optional(),
  logRequests: z.boolean().optional(),
  defaultSearchLimit: z.number().int().positive().optional(),
  maxSearchLimit: z.number().int().positive().optional()
}).strict();

type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Where configuration comes from. Tests pass their own env and argv.
 */
export interface ConfigSources {
  /** Project root; config/ lives here and a relative dataDir resolves against it */
  rootDir: string;
  env?: NodeJS.ProcessEnv;
  argv?: string[];
}

async function readConfigFile(rootDir: string, env: NodeJS.ProcessEnv): Promise<ConfigFile> {
  const configName = env.AYAH_CONFIG ?? 'default';
  const configPath = path.join(rootDir, 'config', `config.${configName}.json`);

  if (!(await fs.pathExists(configPath))) {
    if (env.AYAH_CONFIG !== undefined) {
      console.warn(`Config file ${configPath} not found, using defaults`);
    }
    return {};
  }

  const raw: unknown = await fs.readJson(configPath);
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid config file ${configPath}: ${details}`);
  }
  return parsed.data;
}

function parsePort(value: string, origin: string): number {
  const parsed = portSchema.safeParse(Number(value));
  if (!/^\d+$/.test(value) || !parsed.success) {
    throw new Error(`Invalid port "${value}" from ${origin}`);
  }
  return parsed.data;
}

function parseFlag(value: string, origin: string): boolean {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new Error(`Invalid boolean "${value}" from ${origin}`);
}

function argValue(argv: string[], name: string): string | undefined {
  const arg = argv.find(a => a.startsWith(`--${name}=`));
  return arg === undefined ? undefined : arg.slice(name.length + 3);
}

/**
 * Resolve the effective configuration.
 */
export async function loadConfig(sources: ConfigSources): Promise<AppConfig> {
  const { rootDir, env = process.env, argv = process.argv.slice(2) } = sources;
  const file = await readConfigFile(rootDir, env);

  let port = file.port ?? DEFAULT_CONFIG.port;
  let dataDir = file.dataDir ?? DEFAULT_CONFIG.dataDir;
  let reloadAllowed = file.reloadAllowed ?? DEFAULT_CONFIG.reloadAllowed;

  if (env.PORT !== undefined) port = parsePort(env.PORT, 'PORT');
  if (env.AYAH_DATA_DIR !== undefined) dataDir = env.AYAH_DATA_DIR;
  if (env.AYAH_RELOAD_ALLOWED !== undefined) reloadAllowed = parseFlag(env.AYAH_RELOAD_ALLOWED, 'AYAH_RELOAD_ALLOWED');

  const portArg = argValue(argv, 'port');
  if (portArg !== undefined) port = parsePort(portArg, '--port');
  const dataDirArg = argValue(argv, 'data-dir');
  if (dataDirArg !== undefined) dataDir = dataDirArg;

  const defaultSearchLimit = file.defaultSearchLimit ?? DEFAULT_CONFIG.defaultSearchLimit;
  const maxSearchLimit = file.maxSearchLimit ?? DEFAULT_CONFIG.maxSearchLimit;
  if (defaultSearchLimit > maxSearchLimit) {
    throw new Error(`defaultSearchLimit (${defaultSearchLimit}) exceeds maxSearchLimit (${maxSearchLimit})`);
  }

  return {
    port,
    dataDir: path.resolve(rootDir, dataDir),
    files: {
      arabic: file.files?.arabic ?? DEFAULT_CONFIG.files.arabic,
      translation: file.files?.translation ?? DEFAULT_CONFIG.files.translation,
      commentary: file.files?.commentary ?? DEFAULT_CONFIG.files.commentary
    },
    reloadAllowed,
    logRequests: file.logRequests ?? DEFAULT_CONFIG.logRequests,
    defaultSearchLimit,
    maxSearchLimit
  };
}
