/**
 * Gateway Configuration
 *
 * Everything comes from environment variables. Unparseable numbers fall
 * back to their defaults with a warning; a missing LLM key leaves the
 * gateway on rule-based classification only.
 */

export type LlmProviderType = 'openai' | 'anthropic' | 'none';

export interface NifiConnectionConfig {
  /** NiFi REST API base URL, including /nifi-api */
  baseUrl: string;
  username?: string;
  password?: string;
  /** Per-request timeout */
  timeoutMs: number;
  /** Retries for read operations on transport failures */
  maxRetries: number;
}

export interface ClassifierConfig {
  provider: LlmProviderType;
  openaiApiKey?: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
  anthropicModel: string;
  timeoutMs: number;
  /** Classifier results at or below this fall back to pattern matching */
  confidenceThreshold: number;
}

export interface GatewayConfig {
  port: number;
  host: string;
  nifi: NifiConnectionConfig;
  classifier: ClassifierConfig;
  /** Entries kept per session */
  sessionHistoryLimit: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    console.warn(`[Config] Invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = parseFloat(raw);
  if (Number.isNaN(value)) {
    console.warn(`[Config] Invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readProvider(env: Env): LlmProviderType {
  const raw = (env.LLM_PROVIDER || 'openai').toLowerCase();
  if (raw === 'openai' || raw === 'anthropic' || raw === 'none') {
    return raw;
  }
  console.warn(`[Config] Unknown LLM_PROVIDER="${raw}", using pattern matching only`);
  return 'none';
}

/**
 * Load gateway configuration from the environment
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  return {
    port: readInt(env, 'PORT', 8000),
    host: env.HOST || '0.0.0.0',
    nifi: {
      baseUrl: (env.NIFI_API_URL || 'http://localhost:8080/nifi-api').replace(/\/+$/, ''),
      username: env.NIFI_USERNAME || undefined,
      password: env.NIFI_PASSWORD || undefined,
      timeoutMs: readInt(env, 'NIFI_TIMEOUT_MS', 30000),
      maxRetries: readInt(env, 'NIFI_MAX_RETRIES', 3),
    },
    classifier: {
      provider: readProvider(env),
      openaiApiKey: env.OPENAI_API_KEY || undefined,
      openaiModel: env.OPENAI_MODEL || 'gpt-4o-mini',
      openaiBaseUrl: env.OPENAI_BASE_URL || undefined,
      anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      anthropicModel: env.ANTHROPIC_MODEL || 'claude-3-5-haiku-latest',
      timeoutMs: readInt(env, 'CLASSIFIER_TIMEOUT_MS', 15000),
      confidenceThreshold: readFloat(env, 'CLASSIFIER_CONFIDENCE_THRESHOLD', 0.7),
    },
    sessionHistoryLimit: readInt(env, 'SESSION_HISTORY_LIMIT', 10),
  };
}

/**
 * Validate gateway configuration
 * Returns a list of problems; empty means usable
 */
export function validateGatewayConfig(config: GatewayConfig): string[] {
  const errors: string[] = [];

  if (!/^https?:\/\//.test(config.nifi.baseUrl)) {
    errors.push('NIFI_API_URL must start with http:// or https://');
  }

  if (Boolean(config.nifi.username) !== Boolean(config.nifi.password)) {
    errors.push('NIFI_USERNAME and NIFI_PASSWORD must be set together');
  }

  if (config.classifier.confidenceThreshold < 0 || config.classifier.confidenceThreshold > 1) {
    errors.push('CLASSIFIER_CONFIDENCE_THRESHOLD must be between 0 and 1');
  }

  if (config.sessionHistoryLimit < 1) {
    errors.push('SESSION_HISTORY_LIMIT must be at least 1');
  }

  if (config.port < 1 || config.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  return errors;
}
