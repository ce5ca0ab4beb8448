import type { SchemaObject } from 'ajv';
import { ApiResult, TicketBackend, TicketStatus } from '../ticketing/types';

/** Every tool the model may call. The registry must define exactly these. */
export const TOOL_NAMES = ['create_ticket', 'list_tickets', 'get_ticket', 'update_ticket', 'delete_ticket'] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

// Argument shapes use the model-facing (snake_case) field names.
export interface CreateTicketArgs {
  title: string;
  description: string;
}

export interface ListTicketsArgs {
  status?: TicketStatus;
}

export interface TicketIdArgs {
  ticket_id: string;
}

export interface UpdateTicketArgs extends TicketIdArgs {
  title?: string;
  description?: string;
  status?: TicketStatus;
  resolution?: string;
}

export interface ToolArgsMap {
  create_ticket: CreateTicketArgs;
  list_tickets: ListTicketsArgs;
  get_ticket: TicketIdArgs;
  update_ticket: UpdateTicketArgs;
  delete_ticket: TicketIdArgs;
}

/** Tool execution context */
export interface ToolContext {
  requestId: string;
  tickets: TicketBackend;
}

/** Tool execution result; serialized verbatim into the tool message */
export type ToolResult = ApiResult<unknown>;

/** Tool handler function */
export type ToolHandler<TArgs> = (args: TArgs, ctx: ToolContext) => Promise<ToolResult>;

/** Tool definition metadata */
export interface ToolDefinition<N extends ToolName> {
  name: N;
  version: string;
  /** Read by the model to decide when to call the tool */
  description: string;
  inputSchema: SchemaObject; // JSON Schema for ToolArgsMap[N]
  handler: ToolHandler<ToolArgsMap[N]>;
}

/** Closed mapping from tool name to its typed definition */
export type ToolTable = { readonly [N in ToolName]: ToolDefinition<N> };

export type AnyToolDefinition = ToolTable[ToolName];

/** Tool call log record */
export interface ToolCallLog {
  tool: string;
  version: string;
  toolCallId: string;
  args: unknown;
  result: { success: boolean; error?: string; statusCode?: number };
  durationMs: number;
  timestamp: number;
  requestId: string;
}
