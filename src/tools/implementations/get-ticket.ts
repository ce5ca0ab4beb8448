import { TicketIdArgs, ToolDefinition, ToolHandler } from '../types';
import { ticketIdProperty } from './ticket-tool-utils';

const handler: ToolHandler<TicketIdArgs> = async (args, ctx) => ctx.tickets.getTicket(args.ticket_id);

export const getTicketTool: ToolDefinition<'get_ticket'> = {
  name: 'get_ticket',
  version: '1.0.0',
  description: 'Get details of a specific ticket by its ID',
  inputSchema: {
    type: 'object',
    properties: {
      ticket_id: ticketIdProperty(),
    },
    required: ['ticket_id'],
    additionalProperties: false,
  },
  handler,
};
