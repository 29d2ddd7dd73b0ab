/**
 * Central Configuration Module
 * Loads all settings from environment variables with sensible defaults
 */

export interface FetchConfig {
  userAgent: string;
  pageTimeoutMs: number;
  subPageTimeoutMs: number;
  verifyTimeoutMs: number;
}

export interface SearchConfig {
  serpApiKey: string | null;
  timeoutMs: number;
}

export interface JudgeConfig {
  enabled: boolean;
  anthropicApiKey: string | null;
  model: string;
  maxTokens: number;
}

export interface PipelineConfig {
  delayMs: number;
}

export interface MonitoringConfig {
  sentryDsn: string | null;
  environment: string;
}

export interface Config {
  fetch: FetchConfig;
  search: SearchConfig;
  judge: JudgeConfig;
  pipeline: PipelineConfig;
  monitoring: MonitoringConfig;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseSecret(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;

  const config: Config = {
    fetch: {
      userAgent: process.env.FETCH_USER_AGENT || DEFAULT_USER_AGENT,
      pageTimeoutMs: parseNumber(process.env.FETCH_PAGE_TIMEOUT_MS, 30000),
      subPageTimeoutMs: parseNumber(process.env.FETCH_SUBPAGE_TIMEOUT_MS, 10000),
      verifyTimeoutMs: parseNumber(process.env.FETCH_VERIFY_TIMEOUT_MS, 15000),
    },
    search: {
      serpApiKey: parseSecret(process.env.SERPAPI_API_KEY),
      timeoutMs: parseNumber(process.env.SEARCH_TIMEOUT_MS, 30000),
    },
    judge: {
      enabled: parseBoolean(process.env.AI_VERIFICATION_ENABLED, true),
      // Keys pasted from dashboards often carry a trailing newline
      anthropicApiKey: parseSecret(process.env.ANTHROPIC_API_KEY),
      model: process.env.ANTHROPIC_MODEL || DEFAULT_ANTHROPIC_MODEL,
      maxTokens: parseNumber(process.env.ANTHROPIC_MAX_TOKENS, 50),
    },
    pipeline: {
      delayMs: parseNumber(process.env.ENRICH_DELAY_MS, 2000),
    },
    monitoring: {
      sentryDsn: parseSecret(process.env.SENTRY_DSN),
      environment: process.env.NODE_ENV || 'development',
    },
  };

  cachedConfig = config;
  return config;
}

export function validateConfig(): string[] {
  const warnings: string[] = [];
  const config = loadConfig();

  if (!config.search.serpApiKey) {
    warnings.push('SERPAPI_API_KEY not configured; companies without a website will be skipped');
  }

  if (config.judge.enabled) {
    if (!config.judge.anthropicApiKey) {
      warnings.push('AI verification enabled but ANTHROPIC_API_KEY not configured; candidates will be accepted unverified');
    } else if (!config.judge.anthropicApiKey.startsWith('sk-ant-')) {
      warnings.push("Invalid Anthropic API key format; keys should start with 'sk-ant-'");
    }
  }

  return warnings;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}
