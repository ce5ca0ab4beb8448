import { TICKET_STATUSES } from '../../ticketing/types';

export const TITLE_PROPERTY = {
  type: 'string',
  minLength: 1,
  maxLength: 200,
  description: 'Brief summary of the issue (max 200 characters)',
};

export const DESCRIPTION_PROPERTY = {
  type: 'string',
  minLength: 1,
  maxLength: 5000,
  description: 'Detailed explanation of the problem',
};

export function statusProperty(description: string) {
  return {
    type: 'string',
    enum: [...TICKET_STATUSES],
    description,
  };
}

export function ticketIdProperty(description = 'The unique identifier of the ticket') {
  return {
    type: 'string',
    minLength: 1,
    description,
  };
}
