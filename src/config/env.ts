import dotenv from 'dotenv';
import path from 'path';
import { AppConfig, LOG_LEVELS, LogLevel } from './types';
import { LLMProviderConfig } from '../llm/types';
import { ConfigError } from '../errors';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

export const DEFAULT_TICKET_API_BASE_URL = 'http://localhost:8000/v1';
export const DEFAULT_MAX_TOOL_ROUNDS = 10;

type EnvVars = Record<string, string | undefined>;

function reader(vars: EnvVars) {
  function required(key: string): string {
    const val = vars[key];
    if (!val) throw new ConfigError(`Missing required env var: ${key}`);
    return val;
  }

  function optional(key: string, fallback: string): string {
    return vars[key] || fallback;
  }

  function optionalInt(key: string, fallback: number, min = 1): number {
    const val = vars[key];
    if (!val) return fallback;
    const parsed = Number(val);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new ConfigError(`${key} must be an integer >= ${min}, got "${val}"`);
    }
    return parsed;
  }

  function optionalFloat(key: string): number | undefined {
    const val = vars[key];
    if (!val) return undefined;
    const parsed = Number(val);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(`${key} must be a number, got "${val}"`);
    }
    return parsed;
  }

  return { required, optional, optionalInt, optionalFloat };
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLLMConfig(vars: EnvVars): LLMProviderConfig {
  const { required, optional, optionalInt, optionalFloat } = reader(vars);
  const provider = optional('LLM_PROVIDER', 'openai').toLowerCase();
  const timeoutMs = optionalInt('LLM_TIMEOUT_MS', 30_000);
  const maxRetries = optionalInt('LLM_MAX_RETRIES', 2, 0);
  const temperature = optionalFloat('LLM_TEMPERATURE');

  switch (provider) {
    case 'openai':
      return {
        kind: 'openai',
        apiKey: required('OPENAI_API_KEY'),
        model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
        baseUrl: vars.OPENAI_BASE_URL || undefined,
        timeoutMs,
        maxRetries,
        temperature,
      };
    case 'azure':
      return {
        kind: 'azure',
        endpoint: required('AZURE_OPENAI_ENDPOINT'),
        apiKey: required('AZURE_OPENAI_API_KEY'),
        deployment: optional('AZURE_OPENAI_DEPLOYMENT', 'gpt-5-mini'),
        apiVersion: optional('AZURE_API_VERSION', '2024-12-01-preview'),
        timeoutMs,
        maxRetries,
        temperature,
      };
    default:
      throw new ConfigError(`Unsupported LLM_PROVIDER "${provider}". Expected one of: openai, azure`);
  }
}

/**
 * Resolve the application configuration from a set of environment variables.
 * Pure: reads nothing but `vars`.
 */
export function resolveConfig(vars: EnvVars): AppConfig {
  const { optional, optionalInt } = reader(vars);

  const logLevel = optional('LOG_LEVEL', 'warn').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  return Object.freeze({
    llm: Object.freeze(resolveLLMConfig(vars)),
    ticketApi: Object.freeze({
      baseUrl: optional('TICKET_API_BASE_URL', DEFAULT_TICKET_API_BASE_URL).replace(/\/+$/, ''),
      apiKey: vars.TICKET_API_KEY || undefined,
      timeoutMs: optionalInt('TICKET_API_TIMEOUT_MS', 30_000),
    }),
    agent: Object.freeze({
      maxToolRounds: optionalInt('AGENT_MAX_TOOL_ROUNDS', DEFAULT_MAX_TOOL_ROUNDS),
    }),
    logLevel,
  });
}

/** Resolve configuration from the process environment (after .env is loaded). */
export function loadConfig(): AppConfig {
  return resolveConfig(process.env);
}
