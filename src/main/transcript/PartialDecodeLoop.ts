import { PartialSettings, WhisperTaskName } from '../../shared/types/settings';
import { describeError, toEngineError } from '../errors';
import { DecodeScheduler } from '../stt/DecodeScheduler';
import { STTEngine } from '../stt/STTEngine';
import { RollingWindow } from '../vad/RollingWindow';
import { TranscriptEventBus } from './TranscriptEventBus';

/** Partials are previews; their confidence never goes above this. */
export const PARTIAL_CONFIDENCE_CAP = 0.5;

export interface PartialDecodeLoopOptions extends PartialSettings {
  language: string;
  task: WhisperTaskName;
}

export interface PartialDecodeLoopDeps {
  window: RollingWindow;
  scheduler: DecodeScheduler;
  engine: STTEngine;
  bus: TranscriptEventBus;
  /** True while the segmenter has a segment open. */
  isActive: () => boolean;
}

export type PartialOutcome = 'emitted' | 'empty' | 'skipped' | 'failed';

/**
 * Periodically decodes the rolling window for a live preview.
 *
 * A tick that comes due while the previous decode is still running is
 * dropped, as is any attempt that would have to wait for the engine.
 */
export class PartialDecodeLoop {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<PartialOutcome> | null = null;
  private _missedTicks = 0;

  constructor(
    private readonly deps: PartialDecodeLoopDeps,
    private readonly options: PartialDecodeLoopOptions,
  ) {}

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get isDecoding(): boolean {
    return this.inFlight !== null;
  }

  /** Ticks skipped because a partial was still in flight. */
  get missedTicks(): number {
    return this._missedTicks;
  }

  start(): void {
    if (!this.options.enabled || this.timer) return;
    this._missedTicks = 0;
    this.timer = setInterval(() => this.tick(), this.options.cadenceMs);
  }

  /** Stop the timer and wait for a decode that is already running. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  tick(): void {
    if (this.inFlight) {
      this._missedTicks++;
      return;
    }
    if (!this.deps.isActive()) return;
    if (this.deps.window.durationMs < this.options.minAudioMs) return;

    this.inFlight = this.runOnce().then((outcome) => {
      this.inFlight = null;
      return outcome;
    });
  }

  /** One partial attempt. Never rejects. */
  async runOnce(): Promise<PartialOutcome> {
    const { window, scheduler, engine, bus } = this.deps;

    try {
      const result = await scheduler.tryRun(async () => {
        // Read the window once the engine is ours so the snapshot is current.
        const snapshot = window.snapshot();
        if (snapshot.samples.length === 0) return 'empty' as const;

        const decoded = await engine.decode(snapshot.samples, {
          isFinal: false,
          language: this.options.language,
          task: this.options.task,
        });
        const text = decoded.text.trim();
        if (!text) return 'empty' as const;

        // Published before the slot is released so a waiting final comes after it.
        bus.publish({
          type: 'partial',
          text,
          confidence: Math.min(decoded.confidence ?? PARTIAL_CONFIDENCE_CAP, PARTIAL_CONFIDENCE_CAP),
          windowMs: snapshot.durationMs,
        });
        return 'emitted' as const;
      });

      return result.status === 'skipped' ? 'skipped' : result.value;
    } catch (err) {
      const error = toEngineError(err);
      console.warn('[Partials] Decode failed:', describeError(error));
      bus.publish({
        type: 'error',
        kind: error.kind,
        message: error.message,
        fatal: false,
        stage: 'partial',
      });
      return 'failed';
    }
  }
}
