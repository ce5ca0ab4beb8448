import { Readable, Writable } from 'stream';
import { Shell } from '../../src/cli/shell';
import { TicketAgent } from '../../src/agent/ticket-agent';
import { TicketApiClient } from '../../src/ticketing/ticket-api-client';
import { ToolRuntime } from '../../src/tools/runtime';
import { STUB_BASE_URL, TicketApiStub, createTicketApiStub } from '../helpers/ticket-api-stub';
import { ScriptStep, ScriptedProvider, lastToolResult, toolCall } from '../helpers/scripted-provider';

class Capture extends Writable {
  text = '';

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

describe('Interactive session flow', () => {
  let stub: TicketApiStub;
  let client: TicketApiClient;

  beforeEach(async () => {
    stub = await createTicketApiStub({ apiKey: 'test-ticket-key' });
    client = new TicketApiClient({
      baseUrl: STUB_BASE_URL,
      apiKey: 'test-ticket-key',
      timeoutMs: 1000,
      fetchFn: stub.fetch,
    });
  });

  afterEach(async () => {
    await stub.close();
  });

  async function runSession(lines: string[], steps: ScriptStep[]): Promise<string> {
    const output = new Capture();
    const agent = new TicketAgent({
      provider: new ScriptedProvider(steps),
      tools: new ToolRuntime(client),
      systemPrompt: 'You manage tickets.',
    });
    const shell = new Shell({
      agent,
      ticketApiUrl: client.baseUrl,
      healthCheck: () => client.healthCheck(),
      input: Readable.from(lines.map((line) => `${line}\n`)),
      output,
      colors: false,
    });
    await shell.run();
    return output.text;
  }

  it('should create, resolve and delete a ticket across turns', async () => {
    const text = await runSession(
      [
        'create a ticket about a broken keyboard',
        'resolve it, I replaced the keyboard',
        'now delete it',
        'quit',
      ],
      [
        { toolCalls: [toolCall('call_1', 'create_ticket', { title: 'Broken keyboard', description: 'Keys stick' })] },
        { content: 'Created ticket tkt-1.' },
        // first attempt forgets the resolution, the backend refuses
        { toolCalls: [toolCall('call_2', 'update_ticket', { ticket_id: 'tkt-1', status: 'RESOLVED' })] },
        (request) => {
          expect(lastToolResult(request)).toEqual({
            success: false,
            statusCode: 422,
            error: 'Resolution is required when setting status to RESOLVED',
          });
          return {
            toolCalls: [
              toolCall('call_3', 'update_ticket', {
                ticket_id: 'tkt-1',
                status: 'RESOLVED',
                resolution: 'Replaced the keyboard',
              }),
            ],
          };
        },
        { content: 'Ticket tkt-1 is resolved.' },
        { toolCalls: [toolCall('call_4', 'delete_ticket', { ticket_id: 'tkt-1' })] },
        { content: 'Ticket tkt-1 was deleted.' },
      ],
    );

    expect(text).toContain('Agent: Created ticket tkt-1.\n');
    expect(text).toContain('Agent: Ticket tkt-1 is resolved.\n');
    expect(text).toContain('Agent: Ticket tkt-1 was deleted.\n');
    expect(text.endsWith('Goodbye!\n')).toBe(true);
    expect(stub.tickets.size).toBe(0);
    expect(stub.requests).toEqual([
      'GET /',
      'POST /v1/tickets',
      'PATCH /v1/tickets/tkt-1',
      'PATCH /v1/tickets/tkt-1',
      'DELETE /v1/tickets/tkt-1',
    ]);
  });

  it('should end the session at end of input', async () => {
    const text = await runSession(['list tickets'], [{ content: 'There are no tickets yet.' }]);

    expect(text).toContain('Agent: There are no tickets yet.\n');
    expect(text.endsWith('Goodbye!\n')).toBe(true);
    expect(text).not.toContain('Warning:');
  });

  it('should report a backend outage and keep the session alive', async () => {
    stub.failWith(503, 'Service Unavailable');

    const text = await runSession(
      ['show my tickets', 'help', 'exit'],
      [{ toolCalls: [toolCall('call_1', 'list_tickets', {})] }],
    );

    expect(text).toContain('Error: Ticket API server error (503): Service Unavailable\n');
    expect(text).toContain('Valid statuses: OPEN, RESOLVED, CLOSED\n');
    expect(text.endsWith('Goodbye!\n')).toBe(true);
  });
});
