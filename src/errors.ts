/** Which collaborator an infrastructural failure came from */
export type InfrastructureSource = 'ticket_api' | 'llm';

/**
 * A failure outside the ticket domain (network, credentials, server fault).
 * The model cannot reason about these, so they abort the turn instead of
 * being fed back as a tool result.
 */
export class InfrastructureError extends Error {
  readonly source: InfrastructureSource;
  readonly statusCode?: number;

  constructor(
    source: InfrastructureSource,
    message: string,
    options?: { statusCode?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'InfrastructureError';
    this.source = source;
    this.statusCode = options?.statusCode;
  }
}

/** Invalid or missing startup configuration. Fatal. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A turn was started while another one is still in flight. */
export class AgentBusyError extends Error {
  constructor() {
    super('A turn is already in progress for this conversation');
    this.name = 'AgentBusyError';
  }
}

/** The transcript would violate the tool-call/answer pairing. */
export class ConversationProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversationProtocolError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
