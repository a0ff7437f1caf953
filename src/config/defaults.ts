import path from 'node:path';
import os from 'node:os';
import { fileURLToPath } from 'node:url';
import type { ConductorConfig } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '..', '..');

const configDir = process.env['MODEL_CONDUCTOR_CONFIG_DIR']
  ?? path.join(os.homedir(), '.config', 'model-conductor');

export const defaults: ConductorConfig = {
  defaultProvider: 'claude-sonnet-4-5',
  anthropic: {
    apiKey: '',
    baseUrl: 'https://api.anthropic.com',
    authType: 'auto',
  },
  minimax: {
    apiKey: '',
    baseUrl: 'https://api.minimax.io/anthropic',
  },
  logging: {
    level: 'info',
  },
  capabilityCatalogPath: path.join(projectRoot, 'data', 'capability-catalog.json'),
  rateLimit: {
    cooldownMs: 60_000,
  },
  resources: {},
};

export { configDir };
