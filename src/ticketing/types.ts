export const TICKET_STATUSES = ['OPEN', 'RESOLVED', 'CLOSED'] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

/** Ticket as returned by the backend. The agent only ever holds copies. */
export interface Ticket {
  id: string;
  title: string;
  description: string;
  status: TicketStatus;
  resolution?: string | null;
  created_at?: string;
  updated_at?: string;
}

export interface CreateTicketParams {
  title: string;
  description: string;
}

export interface ListTicketsParams {
  status?: TicketStatus;
  skip?: number;
  limit?: number;
}

export interface UpdateTicketParams {
  ticketId: string;
  title?: string;
  description?: string;
  status?: TicketStatus;
  resolution?: string;
}

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

/** A backend-reported or locally detected failure the model can reason about */
export interface ApiFailure {
  success: false;
  error: string;
  /** HTTP status when the backend reported the failure */
  statusCode?: number;
}

export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

/**
 * Ticket CRUD surface the tools call into.
 * Backend-reported errors resolve to failures; transport faults reject with InfrastructureError.
 */
export interface TicketBackend {
  createTicket(params: CreateTicketParams): Promise<ApiResult<Ticket>>;
  listTickets(params?: ListTicketsParams): Promise<ApiResult<Ticket[]>>;
  getTicket(ticketId: string): Promise<ApiResult<Ticket>>;
  updateTicket(params: UpdateTicketParams): Promise<ApiResult<Ticket>>;
  deleteTicket(ticketId: string): Promise<ApiResult<null>>;
  healthCheck(): Promise<boolean>;
}
