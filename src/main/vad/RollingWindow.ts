import { AudioFrame, FRAME_MS, concatFrames } from '../audio/AudioFrame';

export interface WindowSnapshot {
  samples: Float32Array;
  durationMs: number;
  /** Capture time of the newest frame in the snapshot. */
  endedAt: number;
}

/**
 * Ring of the most recent frames, independent of segment boundaries.
 * The partial decode loop reads snapshots; the frame consumer is the only writer.
 */
export class RollingWindow {
  private readonly ring: (AudioFrame | undefined)[];
  private start = 0;
  private count = 0;

  constructor(
    readonly windowMs: number,
    private readonly frameMs = FRAME_MS,
  ) {
    this.ring = new Array<AudioFrame | undefined>(Math.max(1, Math.floor(windowMs / frameMs)));
  }

  get capacity(): number {
    return this.ring.length;
  }

  get durationMs(): number {
    return this.count * this.frameMs;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  push(frame: AudioFrame): void {
    const slot = (this.start + this.count) % this.ring.length;
    this.ring[slot] = frame;

    if (this.count < this.ring.length) {
      this.count++;
    } else {
      this.start = (this.start + 1) % this.ring.length;
    }
  }

  snapshot(): WindowSnapshot {
    const frames: AudioFrame[] = [];
    for (let i = 0; i < this.count; i++) {
      const frame = this.ring[(this.start + i) % this.ring.length];
      if (frame) frames.push(frame);
    }

    return {
      samples: concatFrames(frames),
      durationMs: frames.length * this.frameMs,
      endedAt: frames.length > 0 ? frames[frames.length - 1].capturedAt : 0,
    };
  }

  clear(): void {
    this.ring.fill(undefined);
    this.start = 0;
    this.count = 0;
  }
}
