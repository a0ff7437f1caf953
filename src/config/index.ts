import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ConductorConfig, LogLevel } from './types.js';
import { defaults, configDir } from './defaults.js';

const configFilePath = path.join(configDir, 'config.json');

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const configFileSchema = z.object({
  defaultProvider: z.string().min(1).optional(),
  anthropic: z.object({
    apiKey: z.string(),
    baseUrl: z.string().url(),
    authType: z.enum(['auto', 'api-key', 'bearer']),
  }).partial().optional(),
  minimax: z.object({
    apiKey: z.string(),
    baseUrl: z.string().url(),
  }).partial().optional(),
  logging: z.object({
    level: logLevelSchema,
  }).partial().optional(),
  capabilityCatalogPath: z.string().min(1).optional(),
  rateLimit: z.object({
    cooldownMs: z.number().int().nonnegative(),
  }).partial().optional(),
  resources: z.object({
    maxCpu: z.number().positive(),
    maxMemoryBytes: z.number().int().positive(),
    maxStorageBytes: z.number().int().positive(),
  }).partial().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export function mergeConfig(base: ConductorConfig, override: ConfigFile): ConductorConfig {
  return {
    defaultProvider: override.defaultProvider ?? base.defaultProvider,
    anthropic: { ...base.anthropic, ...override.anthropic },
    minimax: { ...base.minimax, ...override.minimax },
    logging: { ...base.logging, ...override.logging },
    capabilityCatalogPath: override.capabilityCatalogPath ?? base.capabilityCatalogPath,
    rateLimit: { ...base.rateLimit, ...override.rateLimit },
    resources: { ...base.resources, ...override.resources },
  };
}

export function parseConfigFile(raw: string, source = configFilePath): ConfigFile {
  const result = configFileSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${source}: ${issues}`);
  }
  return result.data;
}

export function applyEnvOverrides(
  config: ConductorConfig,
  env: NodeJS.ProcessEnv = process.env,
): ConductorConfig {
  const next: ConductorConfig = {
    ...config,
    anthropic: { ...config.anthropic },
    minimax: { ...config.minimax },
    logging: { ...config.logging },
  };

  if (env['ANTHROPIC_API_KEY']) {
    next.anthropic.apiKey = env['ANTHROPIC_API_KEY'];
  }
  if (env['ANTHROPIC_BASE_URL']) {
    next.anthropic.baseUrl = env['ANTHROPIC_BASE_URL'];
  }
  if (env['MINIMAX_API_KEY']) {
    next.minimax.apiKey = env['MINIMAX_API_KEY'];
  }
  if (env['MODEL_CONDUCTOR_DEFAULT_PROVIDER']) {
    next.defaultProvider = env['MODEL_CONDUCTOR_DEFAULT_PROVIDER'];
  }
  const envLevel = logLevelSchema.safeParse(env['MODEL_CONDUCTOR_LOG_LEVEL']);
  if (envLevel.success) {
    next.logging.level = envLevel.data;
  }

  return next;
}

export function loadConfig(): ConductorConfig {
  let fileConfig: ConfigFile = {};

  if (fs.existsSync(configFilePath)) {
    fileConfig = parseConfigFile(fs.readFileSync(configFilePath, 'utf-8'));
  }

  return applyEnvOverrides(mergeConfig(defaults, fileConfig));
}

export { configDir };
export type { ConductorConfig, LogLevel };
