import { Writable } from 'stream';

const CLEAR_LINE = '\r\x1b[K';

/**
 * Single rewritten terminal line for partial previews and the level meter.
 * Written to stderr so stdout carries only finalized text.
 */
export class LiveLine {
  private visible = false;

  constructor(
    private readonly out: Writable = process.stderr,
    private readonly width = 100,
  ) {}

  show(text: string): void {
    const line = text.length > this.width ? `…${text.slice(text.length - this.width + 1)}` : text;
    this.out.write(`${CLEAR_LINE}${line}`);
    this.visible = true;
  }

  clear(): void {
    if (!this.visible) return;
    this.out.write(CLEAR_LINE);
    this.visible = false;
  }
}

/** `[####------]` for a level between -60 and 0 dBFS. */
export function levelMeter(levelDbfs: number, cells = 10): string {
  const fraction = Math.max(0, Math.min(1, (levelDbfs + 60) / 60));
  const filled = Math.round(fraction * cells);
  return `[${'#'.repeat(filled)}${'-'.repeat(cells - filled)}]`;
}
