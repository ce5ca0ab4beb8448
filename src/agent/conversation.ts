import { AssistantMessage, ConversationMessage, ToolCallRequest } from './types';
import { ToolResult } from '../tools/types';
import { ConversationProtocolError } from '../errors';

/** Tool results are always sent to the model as pretty-printed JSON */
export function serializeToolResult(result: ToolResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Append-only transcript of one interactive session.
 *
 * Seeded with the system directive. Every tool call the model requests must
 * be answered, in request order, before anything else is appended.
 */
export class Conversation {
  private readonly systemPrompt: string;
  private messages: ConversationMessage[] = [];

  constructor(systemPrompt: string) {
    this.systemPrompt = systemPrompt;
    this.reset();
  }

  get length(): number {
    return this.messages.length;
  }

  appendUser(content: string): void {
    this.assertNoPendingCalls('add a user message');
    this.push({ role: 'user', content });
  }

  appendAssistant(content: string, toolCalls: readonly ToolCallRequest[]): AssistantMessage {
    this.assertNoPendingCalls('add an assistant message');
    const message: AssistantMessage = {
      role: 'assistant',
      content,
      toolCalls: Object.freeze(toolCalls.map((tc) => Object.freeze({ ...tc }))),
    };
    this.push(message);
    return message;
  }

  /** Answer the oldest unanswered tool call of the latest assistant message. */
  appendToolResult(toolCallId: string, result: ToolResult): void {
    const pending = this.pendingToolCalls();
    if (pending.length === 0) {
      throw new ConversationProtocolError(`No tool call is awaiting an answer (got ${toolCallId})`);
    }
    if (pending[0].id !== toolCallId) {
      throw new ConversationProtocolError(
        `Expected an answer for tool call ${pending[0].id}, got ${toolCallId}`,
      );
    }
    this.push({ role: 'tool', toolCallId, content: serializeToolResult(result) });
  }

  /** Tool calls of the latest assistant message that have no answer yet, in order. */
  pendingToolCalls(): ToolCallRequest[] {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (message.role === 'assistant') {
        const answered = this.messages.length - 1 - i;
        return message.toolCalls.slice(answered);
      }
      if (message.role !== 'tool') return [];
    }
    return [];
  }

  /**
   * Answer every pending call with a failure so the transcript stays valid
   * after an aborted turn. Returns how many calls were closed.
   */
  closePendingCalls(reason: string): number {
    const pending = this.pendingToolCalls();
    for (const call of pending) {
      this.appendToolResult(call.id, { success: false, error: reason });
    }
    return pending.length;
  }

  assertReadyForModel(): void {
    this.assertNoPendingCalls('send the transcript to the model');
  }

  snapshot(): readonly ConversationMessage[] {
    return [...this.messages];
  }

  /** Drop everything but the system directive. */
  reset(): void {
    this.messages = [];
    this.push({ role: 'system', content: this.systemPrompt });
  }

  private assertNoPendingCalls(action: string): void {
    const pending = this.pendingToolCalls();
    if (pending.length > 0) {
      throw new ConversationProtocolError(
        `Cannot ${action}: ${pending.length} tool call(s) unanswered (${pending.map((c) => c.id).join(', ')})`,
      );
    }
  }

  private push(message: ConversationMessage): void {
    this.messages.push(Object.freeze(message));
  }
}
