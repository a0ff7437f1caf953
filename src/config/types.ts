export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AnthropicAuthType = 'auto' | 'api-key' | 'bearer';

export interface ConductorConfig {
  /** Provider used when selection finds no eligible candidate. */
  defaultProvider: string;

  anthropic: {
    apiKey: string;
    baseUrl: string;
    authType: AnthropicAuthType;
  };

  minimax: {
    apiKey: string;
    baseUrl: string;
  };

  logging: {
    level: LogLevel;
  };

  capabilityCatalogPath: string;

  rateLimit: {
    cooldownMs: number;
  };

  resources: {
    /** CPU ceiling in hundredths of a percent (8000 = 80%). */
    maxCpu?: number;
    maxMemoryBytes?: number;
    maxStorageBytes?: number;
  };
}
