#!/usr/bin/env node
import { loadConfig } from './config/env';
import { AppConfig } from './config/types';
import { ConfigError } from './errors';
import { createProvider } from './llm/provider-factory';
import { TicketApiClient } from './ticketing/ticket-api-client';
import { ToolRuntime } from './tools/runtime';
import { TicketAgent } from './agent/ticket-agent';
import { promptManager } from './agent/prompt-manager';
import { Shell } from './cli/shell';
import { logger } from './observability/logger';

const CREDENTIALS_HELP = [
  'Set LLM_PROVIDER and the matching credentials, in the environment or a .env file:',
  '  LLM_PROVIDER=openai  OPENAI_API_KEY=...  [OPENAI_MODEL=gpt-4o-mini]',
  '  LLM_PROVIDER=azure   AZURE_OPENAI_ENDPOINT=...  AZURE_OPENAI_API_KEY=...  [AZURE_OPENAI_DEPLOYMENT=...]',
].join('\n');

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n\n${CREDENTIALS_HELP}\n`);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  logger.level = config.logLevel;

  const provider = createProvider(config.llm);
  const tickets = new TicketApiClient(config.ticketApi);
  const agent = new TicketAgent({
    provider,
    tools: new ToolRuntime(tickets),
    systemPrompt: promptManager.getSystemPrompt(),
    maxToolRounds: config.agent.maxToolRounds,
  });

  const shell = new Shell({
    agent,
    ticketApiUrl: tickets.baseUrl,
    healthCheck: () => tickets.healthCheck(),
  });

  logger.info({ provider: provider.name, model: provider.model, ticketApi: tickets.baseUrl }, 'Ticket agent started');
  await shell.run();
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    logger.fatal({ err }, 'Ticket agent crashed');
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  },
);
