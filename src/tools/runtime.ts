import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import type { Logger } from 'pino';
import { ToolRegistry, toolRegistry } from './registry';
import {
  CreateTicketArgs,
  ListTicketsArgs,
  TicketIdArgs,
  ToolArgsMap,
  ToolCallLog,
  ToolContext,
  ToolName,
  ToolResult,
  UpdateTicketArgs,
} from './types';
import { ToolCallRequest } from '../agent/types';
import { TicketBackend } from '../ticketing/types';
import { logger } from '../observability/logger';
import { toolCallDuration } from '../observability/metrics';

const ajv = new Ajv({ allErrors: true });

/** Metric label for names outside the registry; the model controls the raw name */
export const UNKNOWN_TOOL_LABEL = 'unknown';

type ValidatorTable = { readonly [N in ToolName]: ValidateFunction<ToolArgsMap[N]> };

type ParsedArguments = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Resolves model-issued tool calls to typed handlers.
 *
 * - Unknown tool names, malformed JSON and schema violations come back as
 *   failure results the model can correct on its next round.
 * - Failures the backend reports come back unchanged.
 * - InfrastructureError from a handler propagates to the caller.
 */
export class ToolRuntime {
  private readonly registry: ToolRegistry;
  private readonly tickets: TicketBackend;
  private readonly validators: ValidatorTable;

  constructor(tickets: TicketBackend, registry: ToolRegistry = toolRegistry) {
    this.tickets = tickets;
    this.registry = registry;
    registry.assertComplete();
    this.validators = compileValidators(registry);
  }

  async execute(call: ToolCallRequest, requestId: string): Promise<ToolResult> {
    const startTime = Date.now();
    const name = call.name;
    const log = logger.child({ tool: name, toolCallId: call.id, requestId });

    // 1. Check tool exists
    if (!this.registry.has(name)) {
      log.warn('Tool not found in registry');
      return this.reject(call, `Unknown tool: ${name}. Available tools: ${this.registry.names().join(', ')}`, startTime, requestId);
    }

    // 2. Parse the raw argument payload
    const parsed = parseArguments(call.arguments);
    if (!parsed.ok) {
      log.warn({ error: parsed.error }, 'Malformed tool arguments');
      return this.reject(call, `Malformed arguments for ${name}: ${parsed.error}`, startTime, requestId);
    }

    return this.dispatch(name, parsed.value, call, { requestId, tickets: this.tickets }, log, startTime);
  }

  private async dispatch<N extends ToolName>(
    name: N,
    args: unknown,
    call: ToolCallRequest,
    ctx: ToolContext,
    log: Logger,
    startTime: number,
  ): Promise<ToolResult> {
    const tool = this.registry.definition(name);
    const validate = this.validators[name];

    // 3. Schema validation
    if (!validate(args)) {
      const errors = formatValidationErrors(validate.errors);
      log.warn({ errors }, 'Tool input schema validation failed');
      return this.reject(call, `Invalid arguments for ${name}: ${errors}`, startTime, ctx.requestId);
    }

    // 4. Execute
    let status: 'success' | 'failure' | 'error' = 'error';
    try {
      const result = await tool.handler(args, ctx);
      status = result.success ? 'success' : 'failure';
      this.logToolCall(tool.version, call, args, result, Date.now() - startTime, ctx.requestId);
      return result;
    } catch (err) {
      log.error({ err }, 'Tool execution aborted');
      throw err;
    } finally {
      toolCallDuration.observe({ tool: name, version: tool.version, status }, (Date.now() - startTime) / 1000);
    }
  }

  private reject(call: ToolCallRequest, error: string, startTime: number, requestId: string): ToolResult {
    const result: ToolResult = { success: false, error };
    const durationMs = Date.now() - startTime;
    const tool = this.registry.has(call.name) ? call.name : UNKNOWN_TOOL_LABEL;
    toolCallDuration.observe({ tool, version: 'n/a', status: 'rejected' }, durationMs / 1000);
    this.logToolCall('n/a', call, call.arguments, result, durationMs, requestId);
    return result;
  }

  private logToolCall(
    version: string,
    call: ToolCallRequest,
    args: unknown,
    result: ToolResult,
    durationMs: number,
    requestId: string,
  ): void {
    const logEntry: ToolCallLog = {
      tool: call.name,
      version,
      toolCallId: call.id,
      args,
      result: result.success
        ? { success: true }
        : { success: false, error: result.error, statusCode: result.statusCode },
      durationMs,
      timestamp: Date.now(),
      requestId,
    };

    logger.info({ toolCallLog: logEntry }, 'Tool call completed');
  }
}

function compileValidators(registry: ToolRegistry): ValidatorTable {
  return {
    create_ticket: ajv.compile<CreateTicketArgs>(registry.definition('create_ticket').inputSchema),
    list_tickets: ajv.compile<ListTicketsArgs>(registry.definition('list_tickets').inputSchema),
    get_ticket: ajv.compile<TicketIdArgs>(registry.definition('get_ticket').inputSchema),
    update_ticket: ajv.compile<UpdateTicketArgs>(registry.definition('update_ticket').inputSchema),
    delete_ticket: ajv.compile<TicketIdArgs>(registry.definition('delete_ticket').inputSchema),
  };
}

/** An empty payload means "no arguments"; anything else must be a JSON object. */
export function parseArguments(raw: string): ParsedArguments {
  if (raw.trim().length === 0) {
    return { ok: true, value: {} };
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { ok: false, error: 'arguments must be a JSON object' };
  }
  return { ok: true, value };
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => {
      const field = e.instancePath ? e.instancePath.slice(1).replace(/\//g, '.') : 'arguments';
      if (e.keyword === 'enum' && Array.isArray(e.params.allowedValues)) {
        return `${field} must be one of: ${e.params.allowedValues.join(', ')}`;
      }
      if (e.keyword === 'additionalProperties') {
        return `${field} must not include unknown field "${e.params.additionalProperty}"`;
      }
      return `${field} ${e.message ?? 'is invalid'}`;
    })
    .join('; ');
}
