const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_INTERVAL_MS = 80;
const CLEAR_LINE = '\r\x1b[2K';

/**
 * Single-line activity indicator, redrawn in place until stopped.
 */
export class Spinner {
  private readonly output: NodeJS.WritableStream;
  private readonly message: string;
  private readonly paint: (frame: string) => string;
  private interval: NodeJS.Timeout | null = null;
  private currentFrame = 0;

  constructor(output: NodeJS.WritableStream, message = 'Thinking', paint: (frame: string) => string = (f) => f) {
    this.output = output;
    this.message = message;
    this.paint = paint;
  }

  get running(): boolean {
    return this.interval !== null;
  }

  start(): void {
    if (this.interval) return;
    this.currentFrame = 0;
    this.render();
    this.interval = setInterval(() => this.render(), FRAME_INTERVAL_MS);
  }

  /** Stop and erase the indicator line. */
  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    this.output.write(CLEAR_LINE);
  }

  private render(): void {
    this.output.write(`${CLEAR_LINE}${this.paint(FRAMES[this.currentFrame])} ${this.message}...`);
    this.currentFrame = (this.currentFrame + 1) % FRAMES.length;
  }
}
