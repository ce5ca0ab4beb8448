import { ListTicketsArgs, ToolDefinition, ToolHandler } from '../types';
import { statusProperty } from './ticket-tool-utils';

const handler: ToolHandler<ListTicketsArgs> = async (args, ctx) =>
  ctx.tickets.listTickets({ status: args.status });

export const listTicketsTool: ToolDefinition<'list_tickets'> = {
  name: 'list_tickets',
  version: '1.0.0',
  description: 'List all tickets, optionally filtered by status',
  inputSchema: {
    type: 'object',
    properties: {
      status: statusProperty('Filter tickets by status (optional)'),
    },
    required: [],
    additionalProperties: false,
  },
  handler,
};
