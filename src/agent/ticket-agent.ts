import type { Logger } from 'pino';
import { Conversation } from './conversation';
import { promptManager } from './prompt-manager';
import { TurnState, TurnStateMachine } from './turn-state';
import { ConversationMessage, ToolCallRequest, TurnResult } from './types';
import { LLMCompletionResponse, LLMProvider, ToolSpec } from '../llm/types';
import { ToolRuntime } from '../tools/runtime';
import { toolRegistry } from '../tools/registry';
import { DEFAULT_MAX_TOOL_ROUNDS } from '../config/env';
import { AgentBusyError, errorMessage } from '../errors';
import { logger } from '../observability/logger';
import { agentRoundsPerTurn, agentTurns } from '../observability/metrics';
import { TurnTrace, createTurnTrace, summarizeTrace, traced } from '../observability/trace';

export const BUDGET_EXCEEDED_MESSAGE =
  'I could not complete that request within the allowed steps. ' +
  'Please try again or break it into smaller requests.';

export interface TicketAgentOptions {
  provider: LLMProvider;
  tools: ToolRuntime;
  /** Defaults to the registry's function-calling specs */
  toolSpecs?: ToolSpec[];
  /** Defaults to prompts/system.md */
  systemPrompt?: string;
  maxToolRounds?: number;
}

/**
 * TicketAgent: the tool-calling loop behind one interactive session.
 *
 * A turn appends the user message, then alternates model calls and tool
 * dispatch until the model answers without requesting tools, or the round
 * budget runs out. Tool calls in one reply run sequentially in emission
 * order because later calls may use ids produced by earlier ones.
 *
 * Tool failures are fed back to the model. InfrastructureError (model call,
 * unreachable backend, credentials, server faults) aborts the turn and is
 * rethrown to the caller.
 *
 * Not reentrant: one turn in flight per instance.
 */
export class TicketAgent {
  private readonly provider: LLMProvider;
  private readonly tools: ToolRuntime;
  private readonly toolSpecs: readonly ToolSpec[];
  private readonly maxToolRounds: number;
  private readonly conversation: Conversation;
  private readonly machine = new TurnStateMachine();

  constructor(options: TicketAgentOptions) {
    this.provider = options.provider;
    this.tools = options.tools;
    this.toolSpecs = options.toolSpecs ?? toolRegistry.getOpenAIFunctionDefinitions();
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    if (!Number.isInteger(this.maxToolRounds) || this.maxToolRounds < 1) {
      throw new Error(`maxToolRounds must be a positive integer, got ${this.maxToolRounds}`);
    }
    this.conversation = new Conversation(options.systemPrompt ?? promptManager.getSystemPrompt());

    logger.info(
      { component: 'ticket-agent', provider: this.provider.name, model: this.provider.model, maxToolRounds: this.maxToolRounds },
      'Agent initialized',
    );
  }

  get state(): TurnState {
    return this.machine.state;
  }

  get model(): string {
    return this.provider.model;
  }

  /**
   * Run one turn for `userText`. Resolves with the model's final reply or the
   * budget-exceeded result; rejects on infrastructural failure.
   */
  async chat(userText: string): Promise<TurnResult> {
    if (!this.machine.isIdle) {
      throw new AgentBusyError();
    }

    const trace = createTurnTrace();
    const requestId = trace.requestId;
    const log = logger.child({ component: 'ticket-agent', requestId });

    this.conversation.appendUser(userText);
    this.machine.transition('MODEL_CALL', 'user_input', requestId);
    log.debug({ preview: userText.slice(0, 100) }, 'User message received');

    let rounds = 0;
    let toolCalls = 0;

    try {
      while (rounds < this.maxToolRounds) {
        rounds++;
        const reply = await this.callModel(trace, rounds, log);
        this.conversation.appendAssistant(reply.content, reply.toolCalls);

        if (reply.toolCalls.length === 0) {
          this.machine.transition('RESPONSE_READY', 'final_answer', requestId);
          return this.finish({ kind: 'reply', text: reply.content, rounds, toolCalls, requestId }, trace, log);
        }

        this.machine.transition('TOOL_DISPATCH', 'tool_calls_requested', requestId);
        for (const call of reply.toolCalls) {
          await this.dispatch(call, trace, rounds);
          toolCalls++;
        }

        if (rounds < this.maxToolRounds) {
          this.machine.transition('MODEL_CALL', 'tool_results_ready', requestId);
        }
      }

      log.warn({ rounds, toolCalls }, 'Tool round budget exhausted');
      this.machine.transition('RESPONSE_READY', 'budget_exceeded', requestId);
      return this.finish(
        { kind: 'budget_exceeded', text: BUDGET_EXCEEDED_MESSAGE, rounds, toolCalls, requestId },
        trace,
        log,
      );
    } catch (err) {
      const closedCalls = this.conversation.closePendingCalls(`Turn aborted: ${errorMessage(err)}`);
      agentTurns.inc({ outcome: 'error' });
      log.error({ err, rounds, toolCalls, closedCalls, trace: summarizeTrace(trace) }, 'Turn aborted');
      throw err;
    } finally {
      this.machine.transition('AWAITING_USER_INPUT', 'turn_ended', requestId);
    }
  }

  /** Clear the transcript back to the system directive. */
  reset(): void {
    if (!this.machine.isIdle) {
      throw new AgentBusyError();
    }
    this.conversation.reset();
    logger.info({ component: 'ticket-agent' }, 'Conversation reset');
  }

  /** Read-only copy of the transcript. */
  transcript(): readonly ConversationMessage[] {
    return this.conversation.snapshot();
  }

  private async callModel(trace: TurnTrace, round: number, log: Logger): Promise<LLMCompletionResponse> {
    this.conversation.assertReadyForModel();

    const response = await traced(trace, { kind: 'model_call', name: this.provider.model, round }, () =>
      this.provider.complete({
        messages: this.conversation.snapshot(),
        tools: this.toolSpecs,
      }),
    );
    log.debug(
      {
        round,
        toolCallCount: response.toolCalls.length,
        model: response.model,
        latencyMs: response.latencyMs,
        tokens: response.usage.totalTokens,
      },
      'Model reply received',
    );
    return response;
  }

  private async dispatch(call: ToolCallRequest, trace: TurnTrace, round: number): Promise<void> {
    const result = await traced(
      trace,
      { kind: 'tool_call', name: call.name, round, attributes: { toolCallId: call.id } },
      () => this.tools.execute(call, trace.requestId),
      (r) => (r.success ? 'ok' : 'error'),
    );
    this.conversation.appendToolResult(call.id, result);
  }

  private finish(result: TurnResult, trace: TurnTrace, log: Logger): TurnResult {
    agentTurns.inc({ outcome: result.kind });
    agentRoundsPerTurn.observe(result.rounds);
    log.info(
      { outcome: result.kind, rounds: result.rounds, toolCalls: result.toolCalls, trace: summarizeTrace(trace) },
      'Turn completed',
    );
    return result;
  }
}
