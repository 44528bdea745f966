import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config, type OutputFormat, type SearchConfig } from './schema.js';
import { ConfigError } from '../utils/errors.js';

export const DEFAULT_CONFIG_PATHS = [
  './config/local.yaml',
  './config/default.yaml',
  './gserp.yaml',
  './gserp.yml',
];

export function expandEnvVariables(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(expandEnvVariables);
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = expandEnvVariables(val);
    }
    return result;
  }
  return value;
}

export function parseConfig(data: unknown): Config {
  const result = ConfigSchema.safeParse(expandEnvVariables(data ?? {}));

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const paths = configPath ? [configPath] : DEFAULT_CONFIG_PATHS;

  if (configPath && !existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let configData: unknown = {};

  for (const path of paths) {
    if (existsSync(path)) {
      try {
        const content = await readFile(path, 'utf-8');
        configData = parseYaml(content);
        break;
      } catch (error) {
        throw new ConfigError(`Failed to parse config file: ${path}`, { cause: error });
      }
    }
  }

  return parseConfig(configData);
}

export type CLIOverrides = Partial<SearchConfig> & { format?: OutputFormat };

export function mergeConfigWithCLI(config: Config, cliOptions: CLIOverrides): Config {
  const { format, ...search } = cliOptions;
  const searchOverrides = Object.fromEntries(
    Object.entries(search).filter(([, value]) => value !== undefined)
  );

  const merged = parseConfig({
    search: { ...config.search, ...searchOverrides },
    output: format !== undefined ? { ...config.output, format } : config.output,
  });

  return merged;
}
