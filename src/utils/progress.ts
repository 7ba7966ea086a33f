import chalk from 'chalk';

export interface ProgressOptions {
  total: number;
  label?: string;
  showPercentage?: boolean;
  showCount?: boolean;
  barWidth?: number;
  stream?: NodeJS.WriteStream;
}

const RENDER_INTERVAL_MS = 50;

export class ProgressBar {
  private current = 0;
  private total: number;
  private label: string;
  private showPercentage: boolean;
  private showCount: boolean;
  private barWidth: number;
  private stream: NodeJS.WriteStream;
  private startTime = Date.now();
  private lastRender = 0;

  constructor(options: ProgressOptions) {
    this.total = Math.max(1, options.total);
    this.label = options.label ?? '';
    this.showPercentage = options.showPercentage ?? true;
    this.showCount = options.showCount ?? true;
    this.barWidth = options.barWidth ?? 30;
    this.stream = options.stream ?? process.stdout;
  }

  update(current: number, label?: string): void {
    this.current = Math.min(current, this.total);
    if (label !== undefined) this.label = label;
    this.render();
  }

  increment(label?: string): void {
    this.update(this.current + 1, label);
  }

  private render(force = false): void {
    const now = Date.now();
    if (!force && now - this.lastRender < RENDER_INTERVAL_MS && this.current < this.total) {
      return;
    }
    this.lastRender = now;

    const ratio = this.current / this.total;
    const filled = Math.round(ratio * this.barWidth);
    const bar = chalk.cyan('█'.repeat(filled)) + chalk.dim('░'.repeat(this.barWidth - filled));
    const parts = [bar];
    if (this.showPercentage) parts.push(`${Math.round(ratio * 100)}%`.padStart(4));
    if (this.showCount) parts.push(chalk.dim(`(${this.current}/${this.total})`));
    if (this.label) parts.push(this.label);

    this.stream.clearLine?.(0);
    this.stream.cursorTo?.(0);
    this.stream.write(parts.join(' '));
  }

  finish(message?: string): void {
    this.current = this.total;
    this.render(true);
    this.stream.write('\n');
    if (message) {
      const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
      this.stream.write(`${message} ${chalk.dim(`(${elapsed}s)`)}\n`);
    }
  }
}
