import readline from 'readline';
import pc from 'picocolors';
import { Spinner } from './spinner';
import { TicketAgent } from '../agent/ticket-agent';
import { TICKET_STATUSES } from '../ticketing/types';
import { errorMessage } from '../errors';
import { logger } from '../observability/logger';
import { metricsRegistry } from '../observability/metrics';

export type LineOutcome = 'continue' | 'exit';

export interface ShellOptions {
  agent: TicketAgent;
  ticketApiUrl: string;
  /** Probed once at startup; a `false` result prints a warning */
  healthCheck?: () => Promise<boolean>;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Defaults to whether the terminal supports color */
  colors?: boolean;
  /** Show a "Thinking..." indicator during turns; defaults to whether output is a TTY */
  spinner?: boolean;
}

export const PROMPT = 'You: ';

/**
 * Interactive shell: one line in, one agent turn out.
 */
export class Shell {
  private readonly agent: TicketAgent;
  private readonly ticketApiUrl: string;
  private readonly healthCheck?: () => Promise<boolean>;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly colors: ReturnType<typeof pc.createColors>;
  private readonly spinner?: Spinner;
  private log = logger.child({ component: 'shell' });

  constructor(options: ShellOptions) {
    this.agent = options.agent;
    this.ticketApiUrl = options.ticketApiUrl;
    this.healthCheck = options.healthCheck;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.colors = pc.createColors(options.colors ?? pc.isColorSupported);
    if (options.spinner ?? isTTY(this.output)) {
      this.spinner = new Spinner(this.output, 'Thinking', this.colors.yellow);
    }
  }

  /** Banner plus the result of the health probe. */
  async start(): Promise<void> {
    this.print(this.colors.bold('Ticket Agent'));
    this.print(this.colors.gray(`Ticket API: ${this.ticketApiUrl}`));
    this.print(this.colors.gray(`Model: ${this.agent.model}`));
    this.print(this.colors.gray("Type 'help' for commands, 'quit' to leave."));

    if (this.healthCheck && !(await this.healthCheck())) {
      this.print(
        this.colors.yellow(`Warning: ticket API at ${this.ticketApiUrl} is not responding. Requests may fail.`),
      );
    }
    this.print('');
  }

  /**
   * Handle one input line. Built-in commands are matched case-insensitively;
   * anything else is a chat turn. Never throws.
   */
  async handleLine(line: string): Promise<LineOutcome> {
    const text = line.trim();
    if (!text) return 'continue';

    switch (text.toLowerCase()) {
      case 'quit':
      case 'exit':
        return 'exit';
      case 'help':
        this.print(helpText());
        return 'continue';
      case 'reset':
        this.agent.reset();
        this.print(this.colors.gray('Conversation history cleared.'));
        return 'continue';
      case 'stats':
        this.print(await metricsRegistry.metrics());
        return 'continue';
    }

    try {
      const result = await this.whileThinking(() => this.agent.chat(text));
      const label = result.kind === 'budget_exceeded' ? this.colors.yellow('Agent:') : this.colors.cyan('Agent:');
      this.print(`${label} ${result.text}`);
    } catch (err) {
      this.log.debug({ err }, 'Turn failed');
      this.print(this.colors.red(`Error: ${errorMessage(err)}`));
    }
    return 'continue';
  }

  /** Read lines until quit, end of input or Ctrl-C. */
  async run(): Promise<void> {
    await this.start();

    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      prompt: PROMPT,
      terminal: isTTY(this.input),
      historySize: 1000,
    });
    let closed = false;
    rl.once('close', () => {
      closed = true;
    });
    rl.on('SIGINT', () => rl.close());

    rl.prompt();
    for await (const line of rl) {
      if ((await this.handleLine(line)) === 'exit') break;
      rl.prompt();
    }
    if (!closed) rl.close();

    this.print('Goodbye!');
  }

  private async whileThinking<T>(fn: () => Promise<T>): Promise<T> {
    this.spinner?.start();
    try {
      return await fn();
    } finally {
      this.spinner?.stop();
    }
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }
}

export function helpText(): string {
  return [
    'Commands:',
    '  help          Show this message',
    '  reset         Clear the conversation history',
    '  stats         Show request and tool metrics',
    '  quit, exit    Leave the shell',
    '',
    'Example requests:',
    '  Create a ticket about a broken keyboard',
    '  Show me all open tickets',
    '  Resolve ticket <id> with "replaced the keyboard"',
    '  Delete ticket <id>',
    '',
    `Valid statuses: ${TICKET_STATUSES.join(', ')}`,
  ].join('\n');
}

function isTTY(stream: NodeJS.ReadableStream | NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}
