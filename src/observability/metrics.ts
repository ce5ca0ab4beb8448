import { Counter, Histogram, Registry } from 'prom-client';

export const metricsRegistry = new Registry();

export const llmRequestDuration = new Histogram({
  name: 'ticket_agent_llm_request_duration_seconds',
  help: 'Latency of chat-completion requests',
  labelNames: ['provider', 'model', 'status'] as const,
  buckets: [0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [metricsRegistry],
});

export const llmTokenUsage = new Counter({
  name: 'ticket_agent_llm_tokens_total',
  help: 'Tokens consumed by chat-completion requests',
  labelNames: ['provider', 'model', 'token_type'] as const,
  registers: [metricsRegistry],
});

export const toolCallDuration = new Histogram({
  name: 'ticket_agent_tool_call_duration_seconds',
  help: 'Duration of tool executions',
  labelNames: ['tool', 'version', 'status'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [metricsRegistry],
});

export const ticketApiRequests = new Counter({
  name: 'ticket_agent_ticket_api_requests_total',
  help: 'Requests sent to the ticket API, by outcome',
  labelNames: ['method', 'status_class'] as const,
  registers: [metricsRegistry],
});

export const agentTurns = new Counter({
  name: 'ticket_agent_turns_total',
  help: 'Completed agent turns by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const agentRoundsPerTurn = new Histogram({
  name: 'ticket_agent_rounds_per_turn',
  help: 'Model rounds used by each turn',
  buckets: [1, 2, 3, 5, 8, 10],
  registers: [metricsRegistry],
});
