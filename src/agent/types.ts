/** A model-issued request to invoke a named tool */
export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON argument payload exactly as the model produced it */
  arguments: string;
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  /** Empty when the reply only carries tool calls */
  content: string;
  toolCalls: readonly ToolCallRequest[];
}

export interface ToolMessage {
  role: 'tool';
  /** Id of the tool call this message answers */
  toolCallId: string;
  content: string;
}

export type ConversationMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type TurnOutcome = 'reply' | 'budget_exceeded';

/** Result of one chat() invocation */
export interface TurnResult {
  kind: TurnOutcome;
  text: string;
  /** Model calls made during the turn */
  rounds: number;
  toolCalls: number;
  requestId: string;
}
