import {
  ApiFailure,
  ApiResult,
  CreateTicketParams,
  ListTicketsParams,
  Ticket,
  TicketBackend,
  UpdateTicketParams,
} from './types';
import { isTicket, isTicketList } from './schemas';
import { TicketApiConfig } from '../config/types';
import { InfrastructureError, errorMessage } from '../errors';
import { logger } from '../observability/logger';
import { ticketApiRequests } from '../observability/metrics';

/** The subset of `fetch` the client relies on; tests swap in an in-process transport */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TicketApiClientOptions extends TicketApiConfig {
  fetchFn?: FetchLike;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

interface SendOptions {
  body?: Record<string, unknown>;
  query?: URLSearchParams;
}

/**
 * HTTP client for the ticket REST API.
 *
 * Endpoints (relative to the configured base URL):
 * - POST   /tickets         (create)
 * - GET    /tickets         (list, optional ?status=&skip=&limit=)
 * - GET    /tickets/{id}    (read)
 * - PATCH  /tickets/{id}    (partial update)
 * - DELETE /tickets/{id}    (delete, 204)
 *
 * 404, 422 and other client errors resolve to an `ApiFailure` carrying the
 * backend's `detail`. 401, 5xx, unexpected payloads and transport faults
 * reject with `InfrastructureError`.
 */
export class TicketApiClient implements TicketBackend {
  readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private log = logger.child({ component: 'ticket-api-client' });

  constructor(options: TicketApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
    this.log.debug({ baseUrl: this.baseUrl }, 'Ticket API client initialized');
  }

  async createTicket(params: CreateTicketParams): Promise<ApiResult<Ticket>> {
    const result = await this.send('POST', '/tickets', {
      body: { title: params.title, description: params.description },
    });
    return this.expect(result, isTicket, 'ticket');
  }

  async listTickets(params: ListTicketsParams = {}): Promise<ApiResult<Ticket[]>> {
    const query = new URLSearchParams();
    if (params.status) query.set('status', params.status);
    if (params.skip !== undefined) query.set('skip', String(params.skip));
    if (params.limit !== undefined) query.set('limit', String(params.limit));

    const result = await this.send('GET', '/tickets', { query });
    return this.expect(result, isTicketList, 'ticket list');
  }

  async getTicket(ticketId: string): Promise<ApiResult<Ticket>> {
    const invalid = checkTicketId(ticketId);
    if (invalid) return invalid;

    const result = await this.send('GET', ticketPath(ticketId));
    return this.expect(result, isTicket, 'ticket');
  }

  async updateTicket(params: UpdateTicketParams): Promise<ApiResult<Ticket>> {
    const invalid = checkTicketId(params.ticketId);
    if (invalid) return invalid;

    // Only fields the caller provided; the backend treats PATCH as partial
    const body: Record<string, unknown> = {};
    if (params.title !== undefined) body.title = params.title;
    if (params.description !== undefined) body.description = params.description;
    if (params.status !== undefined) body.status = params.status;
    if (params.resolution !== undefined) body.resolution = params.resolution;

    const result = await this.send('PATCH', ticketPath(params.ticketId), { body });
    return this.expect(result, isTicket, 'ticket');
  }

  async deleteTicket(ticketId: string): Promise<ApiResult<null>> {
    const invalid = checkTicketId(ticketId);
    if (invalid) return invalid;

    const result = await this.send('DELETE', ticketPath(ticketId));
    return result.success ? { success: true, data: null } : result;
  }

  /** GET / on the API origin. Never throws. */
  async healthCheck(): Promise<boolean> {
    const url = new URL('/', this.baseUrl).toString();
    try {
      const res = await this.fetchFn(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return res.ok;
    } catch (err) {
      this.log.warn({ err, url }, 'Ticket API health check failed');
      return false;
    }
  }

  private expect<T>(
    result: ApiResult<unknown>,
    guard: (data: unknown) => data is T,
    what: string,
  ): ApiResult<T> {
    if (!result.success) return result;
    const data = result.data;
    if (!guard(data)) {
      this.log.error({ what }, 'Ticket API response did not match the expected shape');
      throw new InfrastructureError('ticket_api', `Ticket API returned an unexpected ${what} payload`);
    }
    return { success: true, data };
  }

  private async send(method: HttpMethod, path: string, options: SendOptions = {}): Promise<ApiResult<unknown>> {
    const query = options.query?.toString();
    const url = `${this.baseUrl}${path}${query ? `?${query}` : ''}`;
    const log = this.log.child({ method, path });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';
    if (this.apiKey) headers['X-API-Key'] = this.apiKey;

    let status: number;
    let text: string;
    try {
      const res = await this.fetchFn(url, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      status = res.status;
      text = await res.text();
    } catch (err) {
      ticketApiRequests.inc({ method, status_class: 'transport_error' });
      const message = isTimeout(err)
        ? `Ticket API request timed out after ${this.timeoutMs}ms`
        : `Failed to connect to ticket API at ${this.baseUrl}: ${errorMessage(err)}`;
      log.error({ err }, message);
      throw new InfrastructureError('ticket_api', message, { cause: err });
    }

    ticketApiRequests.inc({ method, status_class: `${Math.floor(status / 100)}xx` });
    log.debug({ status }, 'Ticket API response');

    if (status >= 400) {
      const detail = extractErrorDetail(text, status);

      if (status === 401) {
        log.error({ status, detail }, 'Ticket API rejected credentials');
        throw new InfrastructureError('ticket_api', `Ticket API rejected the credentials (401): ${detail}`, {
          statusCode: status,
        });
      }
      if (status >= 500) {
        log.error({ status, detail }, 'Ticket API server error');
        throw new InfrastructureError('ticket_api', `Ticket API server error (${status}): ${detail}`, {
          statusCode: status,
        });
      }

      log.warn({ status, detail }, 'Ticket API error');
      return { success: false, statusCode: status, error: detail };
    }

    if (status === 204 || text.trim().length === 0) {
      return { success: true, data: null };
    }

    try {
      return { success: true, data: JSON.parse(text) };
    } catch (err) {
      log.error({ err, status }, 'Ticket API returned malformed JSON');
      throw new InfrastructureError('ticket_api', `Ticket API returned malformed JSON (status ${status})`, {
        statusCode: status,
        cause: err,
      });
    }
  }
}

/**
 * Human-readable message from an error body: the `detail` string, or a list of
 * validation issues rendered as `field: message`, else the raw body.
 */
export function extractErrorDetail(body: string, status: number): string {
  const fallback = body.trim() || `HTTP ${status}`;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return fallback;
  }

  if (typeof parsed !== 'object' || parsed === null || !('detail' in parsed)) {
    return fallback;
  }

  const detail = parsed.detail;
  if (typeof detail === 'string' && detail.length > 0) {
    return detail;
  }
  if (Array.isArray(detail)) {
    const issues = detail.map(formatValidationIssue).filter((issue) => issue.length > 0);
    if (issues.length > 0) return issues.join('; ');
  }
  return fallback;
}

function formatValidationIssue(issue: unknown): string {
  if (typeof issue === 'string') return issue;
  if (typeof issue !== 'object' || issue === null) return '';

  const msg = 'msg' in issue && typeof issue.msg === 'string' ? issue.msg : '';
  const loc = 'loc' in issue && Array.isArray(issue.loc)
    ? issue.loc.filter((part) => part !== 'body').join('.')
    : '';
  return loc && msg ? `${loc}: ${msg}` : msg;
}

function checkTicketId(ticketId: string): ApiFailure | null {
  if (typeof ticketId !== 'string' || ticketId.trim().length === 0) {
    return { success: false, error: 'ticket_id must be a non-empty string' };
  }
  return null;
}

function ticketPath(ticketId: string): string {
  return `/tickets/${encodeURIComponent(ticketId.trim())}`;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}
