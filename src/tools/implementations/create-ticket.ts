import { CreateTicketArgs, ToolDefinition, ToolHandler } from '../types';
import { DESCRIPTION_PROPERTY, TITLE_PROPERTY } from './ticket-tool-utils';
import { logger } from '../../observability/logger';

const handler: ToolHandler<CreateTicketArgs> = async (args, ctx) => {
  const log = logger.child({ tool: 'create_ticket', requestId: ctx.requestId });

  const result = await ctx.tickets.createTicket({
    title: args.title,
    description: args.description,
  });

  if (result.success) {
    log.info({ ticketId: result.data.id }, 'Ticket created');
  }
  return result;
};

export const createTicketTool: ToolDefinition<'create_ticket'> = {
  name: 'create_ticket',
  version: '1.0.0',
  description: 'Create a new support ticket in the system. New tickets start with status OPEN.',
  inputSchema: {
    type: 'object',
    properties: {
      title: TITLE_PROPERTY,
      description: DESCRIPTION_PROPERTY,
    },
    required: ['title', 'description'],
    additionalProperties: false,
  },
  handler,
};
