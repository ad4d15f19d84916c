import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { formatZodIssues } from '@forecastr/core';
import { ConfigSchema, ConfigDefaults, type Config, type ProviderId } from './schema.js';

const DEFAULT_CONFIG_PATH = '.forecastr/config.yaml';

export function getConfigPath(configPath?: string): string {
  return configPath ? expandTilde(configPath) : resolve(homedir(), DEFAULT_CONFIG_PATH);
}

export function expandTilde(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}

function resolveEnvVar(value: string): string {
  let envKey: string | undefined;
  if (value.startsWith('env:')) {
    envKey = value.slice(4);
  } else if (value.startsWith('${') && value.endsWith('}')) {
    envKey = value.slice(2, -1);
  } else if (value.startsWith('$')) {
    envKey = value.slice(1);
  }
  if (envKey === undefined) return value;
  const envVal = process.env[envKey];
  return envVal ? envVal : value;
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (typeof obj === 'object' && obj !== null) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

const PROVIDERS: readonly ProviderId[] = ['anthropic', 'openai', 'google'];

const PROVIDER_ENV_KEYS: Record<ProviderId, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  google: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

/**
 * Drop env references that did not resolve, then fill API keys and the
 * local endpoint from the standard environment variables. Returns the
 * names of the variables used.
 */
function applyEnvVarFallbacks(config: Config, fileValues: { localBaseUrl: boolean }): string[] {
  const used: string[] = [];

  for (const provider of PROVIDERS) {
    const entry = config.model.providers[provider];
    if (isUnresolvedEnvRef(entry.api_key)) entry.api_key = undefined;
    if (entry.api_key) continue;

    for (const name of PROVIDER_ENV_KEYS[provider]) {
      const envKey = process.env[name];
      if (envKey) {
        entry.api_key = envKey;
        used.push(name);
        break;
      }
    }
  }

  const ollama = process.env['OLLAMA_BASE_URL'];
  if (ollama && !fileValues.localBaseUrl) {
    config.model.local_base_url = ollama;
    used.push('OLLAMA_BASE_URL');
  }

  return used;
}

export interface LoadConfigResult {
  config: Config;
  configPath: string;
  configFileExists: boolean;
  envKeysUsed: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);
  const result = structuredClone(ConfigDefaults);
  let localBaseUrl = false;

  if (configFileExists) {
    let fileContent: string;
    try {
      fileContent = readFileSync(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Failed to read config file: ${configPath}`);
    }

    let rawConfig: unknown;
    try {
      rawConfig = parse(fileContent);
    } catch (error) {
      throw new ConfigError(`Failed to parse config file: ${configPath}`);
    }

    if (rawConfig !== null && rawConfig !== undefined) {
      const validated = ConfigSchema.safeParse(resolveEnvVarsInObject(stripNullValues(rawConfig)));
      if (!validated.success) {
        throw new ConfigError('Invalid config', formatZodIssues(validated.error.issues));
      }

      const { ticker, model, run, analysis, documents, output } = validated.data;
      if (ticker) result.ticker = ticker.toUpperCase();
      if (model) {
        const { providers, ...rest } = model;
        result.model = {
          ...result.model,
          ...rest,
          providers: {
            anthropic: { ...result.model.providers.anthropic, ...providers?.anthropic },
            openai: { ...result.model.providers.openai, ...providers?.openai },
            google: { ...result.model.providers.google, ...providers?.google },
          },
        };
        localBaseUrl = rest.local_base_url !== undefined;
      }
      if (run) result.run = { ...result.run, ...run };
      if (analysis) result.analysis = { ...result.analysis, ...analysis };
      if (documents) result.documents = { ...result.documents, ...documents };
      if (output) result.output = { ...result.output, ...output };
    }
  }

  const envKeysUsed = applyEnvVarFallbacks(result, { localBaseUrl });
  return { config: result, configPath, configFileExists, envKeysUsed };
}
