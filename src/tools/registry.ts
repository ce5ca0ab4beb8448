import Ajv from 'ajv';
import { AnyToolDefinition, TOOL_NAMES, ToolDefinition, ToolName, ToolTable } from './types';
import { ToolSpec } from '../llm/types';
import { errorMessage } from '../errors';
import { logger } from '../observability/logger';

import { createTicketTool } from './implementations/create-ticket';
import { listTicketsTool } from './implementations/list-tickets';
import { getTicketTool } from './implementations/get-ticket';
import { updateTicketTool } from './implementations/update-ticket';
import { deleteTicketTool } from './implementations/delete-ticket';

/** The built-in ticket CRUD tools */
export const BUILTIN_TOOLS: ToolTable = Object.freeze({
  create_ticket: createTicketTool,
  list_tickets: listTicketsTool,
  get_ticket: getTicketTool,
  update_ticket: updateTicketTool,
  delete_ticket: deleteTicketTool,
});

export class ToolRegistry {
  private readonly table: ToolTable;

  constructor(table: ToolTable) {
    this.table = table;
  }

  has(name: string): name is ToolName {
    return (TOOL_NAMES as readonly string[]).includes(name);
  }

  get(name: string): AnyToolDefinition | undefined {
    return this.has(name) ? this.table[name] : undefined;
  }

  /** Typed lookup; the definition's handler takes exactly ToolArgsMap[N] */
  definition<N extends ToolName>(name: N): ToolDefinition<N> {
    return this.table[name];
  }

  getAll(): AnyToolDefinition[] {
    return TOOL_NAMES.map((name) => this.table[name]);
  }

  names(): ToolName[] {
    return [...TOOL_NAMES];
  }

  /** Return tool definitions formatted for OpenAI function calling */
  getOpenAIFunctionDefinitions(): ToolSpec[] {
    return this.getAll().map((t) => ({
      type: 'function' as const,
      function: {
        name: t.name,
        description: t.description,
        parameters: t.inputSchema,
      },
    }));
  }

  /**
   * Startup check: every known tool name resolves to a definition that
   * declares the same name with a compilable schema, and the table holds
   * nothing else.
   */
  assertComplete(): void {
    const problems: string[] = [];

    for (const name of TOOL_NAMES) {
      const tool: AnyToolDefinition | undefined = this.table[name];
      if (!tool) {
        problems.push(`missing definition for "${name}"`);
      } else if (tool.name !== name) {
        problems.push(`"${name}" is registered with a definition named "${tool.name}"`);
      } else {
        try {
          new Ajv({ allErrors: true }).compile(tool.inputSchema);
        } catch (err) {
          problems.push(`schema for "${name}" does not compile: ${errorMessage(err)}`);
        }
      }
    }

    for (const key of Object.keys(this.table)) {
      if (!this.has(key)) problems.push(`unexpected tool "${key}"`);
    }

    if (problems.length > 0) {
      throw new Error(`Tool registry is incomplete: ${problems.join('; ')}`);
    }
    logger.debug({ tools: TOOL_NAMES }, 'Tool registry verified');
  }
}

/** Singleton registry */
export const toolRegistry = new ToolRegistry(BUILTIN_TOOLS);
