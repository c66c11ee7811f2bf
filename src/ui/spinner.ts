import { Styler } from './styler';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const INTERVAL = 80; // ms per frame

/**
 * Working indicator on stderr while the model or a tool is busy. Silent
 * when stderr is not a TTY.
 */
export class Spinner {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private label = '';
  private startTime = Date.now();

  constructor(
    private readonly S: Styler,
    private readonly enabled: boolean = process.stderr.isTTY === true && process.env.TERM !== 'dumb'
  ) {}

  start(label: string): void {
    if (!this.enabled) return;
    this.stop();
    this.label = label;
    this.frame = 0;
    this.startTime = Date.now();
    this.timer = setInterval(() => this.render(), INTERVAL);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    process.stderr.write('\r\x1b[K');
  }

  private render(): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    const glyph = FRAMES[this.frame++ % FRAMES.length];
    process.stderr.write(`\r\x1b[K${this.S.dim(`${glyph} ${this.label}... ${elapsed}s`)}`);
  }
}
