import { FinalEvent, FinalEventBody } from '../../shared/types/events';
import { CompletedSegment } from '../../shared/types/segment';
import { WhisperTaskName } from '../../shared/types/settings';
import { EngineError, toEngineError } from '../errors';
import { DecodeScheduler } from '../stt/DecodeScheduler';
import { STTEngine } from '../stt/STTEngine';
import { TranscriptEventBus } from './TranscriptEventBus';

export interface FinalDecodeOptions {
  language: string;
  task: WhisperTaskName;
}

/**
 * Decodes each completed segment exactly once and publishes exactly one
 * `final` for it, even when the decode fails or the text is empty.
 */
export class FinalDecodeTrigger {
  private pending = new Set<Promise<FinalEvent>>();
  private _submitted = 0;
  private _failed = 0;

  constructor(
    private readonly scheduler: DecodeScheduler,
    private readonly engine: STTEngine,
    private readonly bus: TranscriptEventBus,
    private readonly options: FinalDecodeOptions,
  ) {}

  get submitted(): number {
    return this._submitted;
  }

  get failed(): number {
    return this._failed;
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /** Queue the segment for decoding. Resolves with the published final; never rejects. */
  submit(segment: CompletedSegment): Promise<FinalEvent> {
    this._submitted++;
    const job: Promise<FinalEvent> = this.scheduler
      .run('final', () => this.decode(segment))
      .then((event) => {
        this.pending.delete(job);
        return event;
      });
    this.pending.add(job);
    return job;
  }

  /** Resolves once every submitted segment has its final. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async decode(segment: CompletedSegment): Promise<FinalEvent> {
    let text = '';
    let error: EngineError | undefined;
    try {
      const result = await this.engine.decode(segment.samples, {
        isFinal: true,
        language: this.options.language,
        task: this.options.task,
      });
      text = result.text.trim();
    } catch (err) {
      error = toEngineError(err);
      this._failed++;
      console.error(`[Finals] Segment ${segment.id} failed to decode:`, error.message);
    }

    const body: FinalEventBody = {
      type: 'final',
      segmentId: segment.id,
      text,
      latencyMs: Math.max(0, Date.now() - segment.endedAt),
      audioMs: segment.durationMs,
    };
    if (error) body.error = { kind: error.kind, message: error.message };

    return this.bus.publish(body);
  }
}
