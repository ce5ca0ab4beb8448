import { LLMProviderConfig } from '../llm/types';

/** pino level names accepted by LOG_LEVEL */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface TicketApiConfig {
  readonly baseUrl: string;
  /** Sent as X-API-Key when present */
  readonly apiKey?: string;
  readonly timeoutMs: number;
}

export interface AgentSettings {
  /** Upper bound on model-call/tool-dispatch rounds per turn */
  readonly maxToolRounds: number;
}

/** Everything resolved once at startup */
export interface AppConfig {
  readonly llm: LLMProviderConfig;
  readonly ticketApi: TicketApiConfig;
  readonly agent: AgentSettings;
  readonly logLevel: LogLevel;
}
