import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/agent/ or src/agent/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const PROMPTS_DIR = path.resolve(PROJECT_ROOT, 'prompts');

export const FALLBACK_SYSTEM_PROMPT =
  'You are a helpful support ticket assistant. Use the available tools to create, list, ' +
  'view, update and delete tickets, and explain any tool errors to the user. ' +
  'Valid statuses are OPEN, RESOLVED and CLOSED; RESOLVED requires a resolution note.';

/**
 * Loads the behavioral directive that seeds every conversation.
 */
export class PromptManager {
  private systemPrompt: string = FALLBACK_SYSTEM_PROMPT;
  private readonly dir: string;

  constructor(dir: string = PROMPTS_DIR) {
    this.dir = dir;
    this.load();
  }

  load(): void {
    const filepath = path.join(this.dir, 'system.md');
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'System prompt file not found; using built-in prompt');
      this.systemPrompt = FALLBACK_SYSTEM_PROMPT;
      return;
    }

    const content = fs.readFileSync(filepath, 'utf-8').trim();
    if (!content) {
      logger.warn({ filepath }, 'System prompt file is empty; using built-in prompt');
      this.systemPrompt = FALLBACK_SYSTEM_PROMPT;
      return;
    }

    this.systemPrompt = content;
    logger.debug({ filepath, length: content.length }, 'Loaded system prompt');
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }
}

export const promptManager = new PromptManager();
