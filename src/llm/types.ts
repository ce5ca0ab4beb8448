import { ConversationMessage, ToolCallRequest } from '../agent/types';

// ─── Provider Names ───────────────────────────────────────────────
export type LLMProviderName = 'openai' | 'azure';

// ─── Provider Configuration ───────────────────────────────────────
interface CommonProviderConfig {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  /** Only sent when set; some deployments reject non-default values */
  readonly temperature?: number;
}

export interface OpenAIProviderConfig extends CommonProviderConfig {
  readonly kind: 'openai';
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl?: string;
}

export interface AzureProviderConfig extends CommonProviderConfig {
  readonly kind: 'azure';
  readonly endpoint: string;
  readonly apiKey: string;
  readonly deployment: string;
  readonly apiVersion: string;
}

export type LLMProviderConfig = OpenAIProviderConfig | AzureProviderConfig;

// ─── Tool Specs ───────────────────────────────────────────────────
/** Function-calling tool declaration as sent to the model */
export interface ToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

// ─── Completion Request / Response ────────────────────────────────
export interface LLMCompletionRequest {
  messages: readonly ConversationMessage[];
  tools: readonly ToolSpec[];
}

export interface LLMTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  /** Reply text; empty when the model only requested tools */
  content: string;
  /** Tool calls in emission order */
  toolCalls: ToolCallRequest[];
  /** Actual model identifier returned by the provider */
  model: string;
  provider: LLMProviderName;
  usage: LLMTokenUsage;
  latencyMs: number;
}

// ─── Provider Interface ───────────────────────────────────────────
export interface LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Send the transcript and tool specs, return the model's reply.
   * Throws InfrastructureError when the call itself fails.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;

  /** Lightweight connectivity check. */
  healthCheck(): Promise<boolean>;
}
