import Ajv from 'ajv';
import { TICKET_STATUSES, Ticket } from './types';

const ajv = new Ajv({ allErrors: true });

/** Minimum shape a ticket payload must have; extra fields are passed through */
export const TICKET_SCHEMA = {
  type: 'object',
  properties: {
    id: { type: 'string', minLength: 1 },
    title: { type: 'string' },
    description: { type: 'string' },
    status: { type: 'string', enum: [...TICKET_STATUSES] },
  },
  required: ['id', 'title', 'description', 'status'],
};

export const isTicket = ajv.compile<Ticket>(TICKET_SCHEMA);

export const isTicketList = ajv.compile<Ticket[]>({
  type: 'array',
  items: TICKET_SCHEMA,
});
