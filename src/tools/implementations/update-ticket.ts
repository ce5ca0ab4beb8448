import { ToolDefinition, ToolHandler, UpdateTicketArgs } from '../types';
import { DESCRIPTION_PROPERTY, TITLE_PROPERTY, statusProperty, ticketIdProperty } from './ticket-tool-utils';
import { logger } from '../../observability/logger';

const handler: ToolHandler<UpdateTicketArgs> = async (args, ctx) => {
  const log = logger.child({ tool: 'update_ticket', requestId: ctx.requestId });

  const result = await ctx.tickets.updateTicket({
    ticketId: args.ticket_id,
    title: args.title,
    description: args.description,
    status: args.status,
    resolution: args.resolution,
  });

  if (result.success) {
    log.info({ ticketId: result.data.id, status: result.data.status }, 'Ticket updated');
  }
  return result;
};

export const updateTicketTool: ToolDefinition<'update_ticket'> = {
  name: 'update_ticket',
  version: '1.0.0',
  description:
    "Update an existing ticket's title, description, status, or resolution. " +
    'Only the provided fields change. Setting status to RESOLVED requires resolution notes.',
  inputSchema: {
    type: 'object',
    properties: {
      ticket_id: ticketIdProperty('The unique identifier of the ticket to update'),
      title: { ...TITLE_PROPERTY, description: 'New title for the ticket (optional)' },
      description: { ...DESCRIPTION_PROPERTY, description: 'New description for the ticket (optional)' },
      status: statusProperty('New status: OPEN, RESOLVED, or CLOSED'),
      resolution: {
        type: 'string',
        maxLength: 2000,
        description: 'Resolution notes explaining how the issue was fixed (required when status is RESOLVED)',
      },
    },
    required: ['ticket_id'],
    additionalProperties: false,
  },
  handler,
};
