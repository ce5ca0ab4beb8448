import OpenAI from 'openai';
import {
  LLMProvider,
  LLMProviderName,
  LLMCompletionRequest,
  LLMCompletionResponse,
} from '../types';
import { ConversationMessage, ToolCallRequest } from '../../agent/types';
import { InfrastructureError, errorMessage } from '../../errors';
import { logger } from '../../observability/logger';
import { llmRequestDuration, llmTokenUsage } from '../../observability/metrics';

export interface OpenAIProviderOptions {
  name: LLMProviderName;
  /** Model name, or the deployment name on Azure */
  model: string;
  temperature?: number;
}

/**
 * Chat-completions adapter with native function calling.
 *
 * Serves both provider configurations: the plain `OpenAI` client and the
 * `AzureOpenAI` client share the same chat completions surface, so the
 * factory only differs in how it builds the client.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name: LLMProviderName;
  readonly model: string;
  private readonly temperature?: number;
  private client: OpenAI;
  private log = logger.child({ component: 'openai-provider' });

  constructor(client: OpenAI, options: OpenAIProviderOptions) {
    this.client = client;
    this.name = options.name;
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const start = Date.now();
    const timer = llmRequestDuration.startTimer({ provider: this.name, model: this.model });

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: request.messages.map(toChatMessage),
        ...(request.tools.length > 0 ? { tools: [...request.tools] } : {}),
        ...(this.temperature !== undefined ? { temperature: this.temperature } : {}),
      });
    } catch (err) {
      timer({ status: 'error' });
      this.log.warn({ err, provider: this.name }, 'Chat completion request failed');
      throw new InfrastructureError('llm', `Language model request failed: ${errorMessage(err)}`, {
        statusCode: statusOf(err),
        cause: err,
      });
    }
    timer({ status: 'success' });

    const choice = completion.choices[0];
    if (!choice) {
      throw new InfrastructureError('llm', 'Language model returned no choices');
    }

    const toolCalls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map((tc) => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    const usage = completion.usage;
    const model = completion.model ?? this.model;
    llmTokenUsage.inc({ provider: this.name, model, token_type: 'prompt' }, usage?.prompt_tokens ?? 0);
    llmTokenUsage.inc({ provider: this.name, model, token_type: 'completion' }, usage?.completion_tokens ?? 0);

    return {
      content: choice.message.content ?? '',
      toolCalls,
      model,
      provider: this.name,
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
      },
      latencyMs: Date.now() - start,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (err) {
      this.log.warn({ err }, 'Model provider health check failed');
      return false;
    }
  }
}

/** Map our transcript format onto the chat completions message params */
export function toChatMessage(message: ConversationMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      if (message.toolCalls.length === 0) {
        return { role: 'assistant', content: message.content };
      }
      return {
        role: 'assistant',
        content: message.content || null,
        tool_calls: message.toolCalls.map((tc) => ({
          id: tc.id,
          type: 'function' as const,
          function: { name: tc.name, arguments: tc.arguments },
        })),
      };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}
