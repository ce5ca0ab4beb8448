import { BUDGET_EXCEEDED_MESSAGE, TicketAgent } from '../../src/agent/ticket-agent';
import { ConversationMessage, ToolCallRequest } from '../../src/agent/types';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider } from '../../src/llm/types';
import { TicketApiClient } from '../../src/ticketing/ticket-api-client';
import { ToolRuntime } from '../../src/tools/runtime';
import { AgentBusyError, InfrastructureError } from '../../src/errors';
import { STUB_BASE_URL, TicketApiStub, createTicketApiStub } from '../helpers/ticket-api-stub';
import { LoopingProvider, ScriptStep, ScriptedProvider, lastToolResult, toolCall } from '../helpers/scripted-provider';

const SYSTEM_PROMPT = 'You manage tickets.';

function createdId(request: LLMCompletionRequest): string {
  const { data } = lastToolResult(request);
  return typeof data === 'object' && data !== null && 'id' in data ? String(data.id) : 'unknown';
}

function toolAnswers(messages: readonly ConversationMessage[]): Array<{ id: string; result: unknown }> {
  return messages.flatMap((m) => (m.role === 'tool' ? [{ id: m.toolCallId, result: JSON.parse(m.content) }] : []));
}

describe('TicketAgent', () => {
  let stub: TicketApiStub;
  let tools: ToolRuntime;

  function agentWith(provider: LLMProvider, maxToolRounds = 5): TicketAgent {
    return new TicketAgent({ provider, tools, systemPrompt: SYSTEM_PROMPT, maxToolRounds });
  }

  function scripted(...steps: ScriptStep[]): ScriptedProvider {
    return new ScriptedProvider(steps);
  }

  beforeEach(async () => {
    stub = await createTicketApiStub();
    tools = new ToolRuntime(new TicketApiClient({ baseUrl: STUB_BASE_URL, timeoutMs: 1000, fetchFn: stub.fetch }));
  });

  afterEach(async () => {
    await stub.close();
  });

  describe('final answers', () => {
    it('should return the reply when the model asks for no tools', async () => {
      const provider = scripted({ content: 'Hello! How can I help with your tickets?' });
      const agent = agentWith(provider);

      const result = await agent.chat('hi');

      expect(result).toMatchObject({
        kind: 'reply',
        text: 'Hello! How can I help with your tickets?',
        rounds: 1,
        toolCalls: 0,
      });
      expect(agent.state).toBe('AWAITING_USER_INPUT');
    });

    it('should send the transcript and all tool specs to the model', async () => {
      const provider = scripted({ content: 'Hi.' });

      await agentWith(provider).chat('hi');

      expect(provider.requests[0].messages).toEqual([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'hi' },
      ]);
      expect(provider.requests[0].tools.map((t) => t.function.name)).toEqual([
        'create_ticket',
        'list_tickets',
        'get_ticket',
        'update_ticket',
        'delete_ticket',
      ]);
    });
  });

  describe('tool rounds', () => {
    it('should create a ticket and confirm it with the new id', async () => {
      const provider = scripted(
        { toolCalls: [toolCall('call_1', 'create_ticket', { title: 'Broken keyboard', description: 'Keys stick' })] },
        (request) => ({ content: `I created ticket ${createdId(request)} for your broken keyboard.` }),
      );
      const agent = agentWith(provider);

      const result = await agent.chat('create a ticket about a broken keyboard');

      expect(result).toMatchObject({
        kind: 'reply',
        text: 'I created ticket tkt-1 for your broken keyboard.',
        rounds: 2,
        toolCalls: 1,
      });
      expect(stub.tickets.get('tkt-1')?.status).toBe('OPEN');
      expect(agent.transcript().map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'assistant']);
    });

    it('should keep working after a caller tampers with the transcript it was given', async () => {
      const provider = scripted({ toolCalls: [toolCall('call_1', 'list_tickets', {})] }, { content: 'No tickets.' }, {
        content: 'Still no tickets.',
      });
      const agent = agentWith(provider);
      await agent.chat('list my tickets');

      const requested = agent.transcript()[2];
      if (requested.role !== 'assistant') throw new Error('expected an assistant message');
      expect(() => (requested.toolCalls as ToolCallRequest[]).push(toolCall('ghost', 'delete_ticket', {}))).toThrow(
        TypeError,
      );

      await expect(agent.chat('again')).resolves.toMatchObject({ kind: 'reply', text: 'Still no tickets.' });
    });

    it('should feed a not-found failure back and return the explanation', async () => {
      const provider = scripted(
        { toolCalls: [toolCall('call_1', 'update_ticket', { ticket_id: 'does-not-exist', status: 'CLOSED' })] },
        (request) => ({ content: `Sorry, that failed: ${lastToolResult(request).error}` }),
      );
      const agent = agentWith(provider);

      const result = await agent.chat('close ticket does-not-exist');

      expect(result.kind).toBe('reply');
      expect(result.text).toBe('Sorry, that failed: Ticket does-not-exist not found');
      expect(toolAnswers(agent.transcript())).toEqual([
        { id: 'call_1', result: { success: false, statusCode: 404, error: 'Ticket does-not-exist not found' } },
      ]);
    });

    it('should run calls of one reply in order so later calls see earlier results', async () => {
      const provider = scripted(
        {
          toolCalls: [
            toolCall('call_a', 'create_ticket', { title: 'Mouse', description: 'Double clicks' }),
            toolCall('call_b', 'update_ticket', { ticket_id: 'tkt-1', status: 'CLOSED' }),
          ],
        },
        { content: 'Created and closed tkt-1.' },
      );
      const agent = agentWith(provider);

      const result = await agent.chat('open and immediately close a ticket about my mouse');

      expect(result).toMatchObject({ kind: 'reply', rounds: 2, toolCalls: 2 });
      expect(stub.requests).toEqual(['POST /v1/tickets', 'PATCH /v1/tickets/tkt-1']);
      const answers = toolAnswers(agent.transcript());
      expect(answers.map((a) => a.id)).toEqual(['call_a', 'call_b']);
      expect(answers[1].result).toMatchObject({ success: true, data: { id: 'tkt-1', status: 'CLOSED' } });
    });

    it('should answer every call before the next model call', async () => {
      const provider = scripted(
        {
          toolCalls: [
            toolCall('call_1', 'list_tickets', {}),
            toolCall('call_2', 'no_such_tool', {}),
            toolCall('call_3', 'get_ticket', 'not json'),
          ],
        },
        { content: 'Done.' },
      );

      await agentWith(provider).chat('do several things');

      const second = provider.requests[1].messages;
      expect(second.slice(-3).map((m) => (m.role === 'tool' ? m.toolCallId : m.role))).toEqual([
        'call_1',
        'call_2',
        'call_3',
      ]);
      expect(toolAnswers(second).map((a) => a.result)).toEqual([
        { success: true, data: [] },
        {
          success: false,
          error:
            'Unknown tool: no_such_tool. Available tools: create_ticket, list_tickets, get_ticket, update_ticket, delete_ticket',
        },
        { success: false, error: expect.stringMatching(/^Malformed arguments for get_ticket: invalid JSON/) },
      ]);
    });

    it('should return budget_exceeded when the model never stops calling tools', async () => {
      const provider = new LoopingProvider('list_tickets', {});
      const agent = agentWith(provider, 3);

      const result = await agent.chat('keep going');

      expect(result).toMatchObject({ kind: 'budget_exceeded', text: BUDGET_EXCEEDED_MESSAGE, rounds: 3, toolCalls: 3 });
      expect(provider.requests).toHaveLength(3);
      expect(agent.state).toBe('AWAITING_USER_INPUT');
      // every requested call still has its answer
      expect(agent.transcript()).toHaveLength(2 + 3 * 2);
      expect(agent.transcript()[7]).toMatchObject({ role: 'tool', toolCallId: 'call_loop_3' });
    });
  });

  describe('infrastructural failures', () => {
    it('should abort the turn and close pending calls when the backend fails', async () => {
      const provider = scripted(
        { toolCalls: [toolCall('call_1', 'list_tickets', {}), toolCall('call_2', 'get_ticket', { ticket_id: 'tkt-1' })] },
        { content: 'Back online.' },
      );
      const agent = agentWith(provider);
      stub.failWith(500);

      await expect(agent.chat('show my tickets')).rejects.toThrow(
        'Ticket API server error (500): Internal Server Error',
      );

      expect(agent.state).toBe('AWAITING_USER_INPUT');
      const aborted = { success: false, error: 'Turn aborted: Ticket API server error (500): Internal Server Error' };
      expect(toolAnswers(agent.transcript())).toEqual([
        { id: 'call_1', result: aborted },
        { id: 'call_2', result: aborted },
      ]);

      stub.failWith(null);
      const next = await agent.chat('try again');
      expect(next.text).toBe('Back online.');
    });

    it('should surface model errors and keep the user message', async () => {
      const failure = new InfrastructureError('llm', 'Language model request failed: Connection error.');
      const agent = agentWith(scripted(failure));

      await expect(agent.chat('hello?')).rejects.toBe(failure);

      expect(agent.state).toBe('AWAITING_USER_INPUT');
      expect(agent.transcript()).toEqual([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'hello?' },
      ]);
    });
  });

  describe('concurrency', () => {
    it('should reject a second turn while one is in flight', async () => {
      const held: { release?: (response: LLMCompletionResponse) => void } = {};
      const provider: LLMProvider = {
        name: 'openai',
        model: 'held-model',
        complete: () =>
          new Promise<LLMCompletionResponse>((resolve) => {
            held.release = resolve;
          }),
        healthCheck: async () => true,
      };
      const agent = agentWith(provider);

      const first = agent.chat('first');

      expect(agent.state).toBe('MODEL_CALL');
      await expect(agent.chat('second')).rejects.toThrow(AgentBusyError);
      expect(() => agent.reset()).toThrow('A turn is already in progress for this conversation');

      if (!held.release) throw new Error('model was never called');
      held.release({
        content: 'First answer.',
        toolCalls: [],
        model: 'held-model',
        provider: 'openai',
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        latencyMs: 0,
      });

      expect((await first).text).toBe('First answer.');
      expect(agent.transcript().filter((m) => m.role === 'user')).toEqual([{ role: 'user', content: 'first' }]);
    });
  });

  describe('reset', () => {
    it('should start a fresh transcript holding only the system directive', async () => {
      const agent = agentWith(scripted({ content: 'Hi.' }));
      await agent.chat('hi');

      agent.reset();

      expect(agent.transcript()).toEqual([{ role: 'system', content: SYSTEM_PROMPT }]);
    });
  });

  it('should reject a round budget below 1', () => {
    expect(() => agentWith(scripted(), 0)).toThrow('maxToolRounds must be a positive integer, got 0');
  });
});
