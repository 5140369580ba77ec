import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { ConfigError } from './errors.js';
import { DEFAULT_PIPELINE_FILE } from '../parsers/index.js';

export const DEFAULT_STATE_FILE = '.qgate/state.json';

const ConfigSchema = z.object({
  workspaceRoot: z.string().min(1).default('.'),
  pipelineFile: z.string().min(1).default(DEFAULT_PIPELINE_FILE),
  stateFile: z.string().min(1).default(DEFAULT_STATE_FILE),
  verbose: z.boolean().default(false),
}).strict();

const ConfigFileSchema = ConfigSchema.partial();

export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
  workspaceRoot?: string;
  pipelineFile?: string;
  stateFile?: string;
  verbose?: boolean;
  configFile?: string;
}

const DEFAULT_CONFIG_FILENAME = '.qgaterc.json';

function loadConfigFile(configPath: string | undefined, cwd: string, home: string | undefined): Partial<Config> {
  const paths = configPath
    ? [resolve(cwd, configPath)]
    : [resolve(cwd, DEFAULT_CONFIG_FILENAME), ...(home ? [resolve(home, DEFAULT_CONFIG_FILENAME)] : [])];

  for (const filePath of paths) {
    if (!existsSync(filePath)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch {
      if (configPath) throw new ConfigError(`Failed to parse config file: ${filePath}`); // Only throw if explicitly specified
      continue;
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid config file: ${filePath}`, parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
    }
    return parsed.data;
  }

  return {};
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Partial<Config> {
  const config: Partial<Config> = {};

  if (env.QGATE_WORKSPACE) config.workspaceRoot = env.QGATE_WORKSPACE;
  if (env.QGATE_PIPELINE_FILE) config.pipelineFile = env.QGATE_PIPELINE_FILE;
  if (env.QGATE_STATE_FILE) config.stateFile = env.QGATE_STATE_FILE;
  if (env.QGATE_VERBOSE) config.verbose = env.QGATE_VERBOSE === 'true' || env.QGATE_VERBOSE === '1';

  return config;
}

/**
 * Merges config file, QGATE_* environment variables and CLI flags (highest
 * priority). Paths in the result are absolute: workspaceRoot against the
 * current directory, the other files against workspaceRoot.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const fileConfig = loadConfigFile(overrides.configFile, cwd, env.HOME); // Priority 3: Config file
  const envConfig = loadEnvConfig(env); // Priority 2: Environment variables

  const { configFile: _, ...cliOverrides } = overrides; // Priority 1: CLI flags (strip configFile key)
  const filteredOverrides = Object.fromEntries(Object.entries(cliOverrides).filter(([, v]) => v !== undefined));

  const parsed = ConfigSchema.safeParse({ ...fileConfig, ...envConfig, ...filteredOverrides });
  if (!parsed.success) {
    throw new ConfigError('Invalid runtime configuration', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }

  const workspaceRoot = resolve(cwd, parsed.data.workspaceRoot);
  return {
    ...parsed.data,
    workspaceRoot,
    pipelineFile: resolve(workspaceRoot, parsed.data.pipelineFile),
    stateFile: resolve(workspaceRoot, parsed.data.stateFile),
  };
}

export function generateDefaultConfig(): string {
  const template: Record<string, unknown> = {
    workspaceRoot: '.',
    pipelineFile: DEFAULT_PIPELINE_FILE,
    stateFile: DEFAULT_STATE_FILE,
    verbose: false,
  };
  return JSON.stringify(template, null, 2);
}

export function getConfigFilePath(cwd: string = process.cwd()): string {
  return resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

export { DEFAULT_CONFIG_FILENAME };
