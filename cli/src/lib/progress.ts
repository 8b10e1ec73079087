import { formatBytes, formatSpeed, formatEta } from './format.js';
import { dim, cyan, green, hideCursor, showCursor, clearLine } from './output.js';

const BAR_CHAR_FILLED = '━';
const BAR_CHAR_HEAD = '╺';
const BAR_CHAR_EMPTY = '─';

interface SpeedSample {
  time: number;
  bytes: number;
}

export interface ProgressUpdate {
  block: number;
  processedBytes: number;
  /** Unknown while downloading. */
  totalBytes?: number;
}

/**
 * Single-line transfer bar. Downloads have no known total, so they show a
 * running byte count instead of a percentage.
 */
export class ProgressRenderer {
  private startTime = 0;
  private samples: SpeedSample[] = [];
  private smoothedSpeed = 0;
  private lastRenderTime = 0;
  private lastBytes = 0;
  private rendered = false;
  private finished = false;

  constructor(private readonly label: string, private readonly enabled = process.stdout.isTTY === true) {}

  update(evt: ProgressUpdate): void {
    if (this.finished) return;

    const now = Date.now();
    if (this.startTime === 0) {
      this.startTime = now;
      if (this.enabled) hideCursor();
    }
    this.lastBytes = evt.processedBytes;

    // Speed sampling (rolling window of ~3 seconds)
    this.samples.push({ time: now, bytes: evt.processedBytes });
    const windowStart = now - 3000;
    while (this.samples.length > 2 && this.samples[0].time < windowStart) {
      this.samples.shift();
    }

    if (this.samples.length >= 2) {
      const oldest = this.samples[0];
      const newest = this.samples[this.samples.length - 1];
      const dt = (newest.time - oldest.time) / 1000;
      if (dt > 0) {
        const rawSpeed = (newest.bytes - oldest.bytes) / dt;
        this.smoothedSpeed = this.smoothedSpeed === 0
          ? rawSpeed
          : this.smoothedSpeed * 0.7 + rawSpeed * 0.3;
      }
    }

    if (!this.enabled) return;

    const complete = evt.totalBytes !== undefined && evt.processedBytes >= evt.totalBytes;
    // Throttle renders to ~15fps
    if (now - this.lastRenderTime < 67 && !complete) return;
    this.lastRenderTime = now;

    this.render(evt);
  }

  private render(evt: ProgressUpdate): void {
    const speedStr = this.smoothedSpeed > 0 ? formatSpeed(this.smoothedSpeed) : '---';
    const blockStr = dim(`#${evt.block}`);
    let line: string;

    if (evt.totalBytes === undefined || evt.totalBytes === 0) {
      line = `  ${this.label}  ${formatBytes(evt.processedBytes)}  ${speedStr}  ${blockStr}`;
    } else {
      const pct = Math.min(100, (evt.processedBytes / evt.totalBytes) * 100);
      const pctStr = `${Math.floor(pct)}%`.padStart(4);
      const etaStr = pct >= 100
        ? green('Done')
        : this.smoothedSpeed > 0
          ? `ETA ${formatEta((evt.totalBytes - evt.processedBytes) / this.smoothedSpeed)}`
          : '';

      const suffix = `${pctStr}  ${speedStr}  ${etaStr}`;
      const termWidth = process.stdout.columns || 80;
      const barWidth = Math.max(10, Math.min(termWidth - 6 - suffix.length, 40));
      const filledWidth = Math.round((pct / 100) * barWidth);

      let bar: string;
      if (pct >= 100) {
        bar = green(BAR_CHAR_FILLED.repeat(barWidth));
      } else if (filledWidth === 0) {
        bar = dim(BAR_CHAR_EMPTY.repeat(barWidth));
      } else {
        bar = cyan(BAR_CHAR_FILLED.repeat(filledWidth - 1) + BAR_CHAR_HEAD) + dim(BAR_CHAR_EMPTY.repeat(barWidth - filledWidth));
      }
      line = `  [${bar}] ${suffix}`;
    }

    clearLine();
    process.stdout.write(line + '\r');
    this.rendered = true;
  }

  finish(): void {
    if (this.finished) return;
    this.finished = true;
    if (!this.enabled) return;
    showCursor();
    if (this.rendered) {
      process.stdout.write('\n');
    }
  }

  getElapsedMs(): number {
    return this.startTime > 0 ? Date.now() - this.startTime : 0;
  }

  getAverageSpeed(): number {
    const elapsed = this.getElapsedMs() / 1000;
    return elapsed > 0 ? this.lastBytes / elapsed : 0;
  }
}
