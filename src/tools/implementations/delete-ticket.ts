import { TicketIdArgs, ToolDefinition, ToolHandler } from '../types';
import { ticketIdProperty } from './ticket-tool-utils';
import { logger } from '../../observability/logger';

const handler: ToolHandler<TicketIdArgs> = async (args, ctx) => {
  const result = await ctx.tickets.deleteTicket(args.ticket_id);
  if (result.success) {
    logger.info({ tool: 'delete_ticket', requestId: ctx.requestId, ticketId: args.ticket_id }, 'Ticket deleted');
    return { success: true, data: { ticketId: args.ticket_id, deleted: true } };
  }
  return result;
};

export const deleteTicketTool: ToolDefinition<'delete_ticket'> = {
  name: 'delete_ticket',
  version: '1.0.0',
  description: 'Permanently delete a ticket from the system',
  inputSchema: {
    type: 'object',
    properties: {
      ticket_id: ticketIdProperty('The unique identifier of the ticket to delete'),
    },
    required: ['ticket_id'],
    additionalProperties: false,
  },
  handler,
};
