import { EventEmitter } from 'events';
import { StatusEvent } from '../../shared/types/events';
import { SessionStatus } from '../../shared/types/network';
import { CompletedSegment } from '../../shared/types/segment';
import { AppSettings } from '../../shared/types/settings';
import { AudioFrame, SILENCE_FLOOR_DBFS } from '../audio/AudioFrame';
import { FrameQueue } from '../audio/FrameQueue';
import { FrameSource } from '../audio/FrameSource';
import { CaptureError, describeError } from '../errors';
import { DecodeScheduler } from '../stt/DecodeScheduler';
import { STTEngine } from '../stt/STTEngine';
import { FinalDecodeTrigger } from '../transcript/FinalDecodeTrigger';
import { PartialDecodeLoop } from '../transcript/PartialDecodeLoop';
import { TranscriptEventBus } from '../transcript/TranscriptEventBus';
import { RollingWindow } from '../vad/RollingWindow';
import { Segmenter } from '../vad/Segmenter';
import { EnergyClassifier, VoiceActivityClassifier } from '../vad/VoiceActivityClassifier';

/** How long the consumer waits on an empty queue before re-checking state. */
export const CONSUMER_POLL_MS = 200;

export interface DictationPipelineDeps {
  source: FrameSource;
  engine: STTEngine;
  classifier?: VoiceActivityClassifier;
  bus?: TranscriptEventBus;
}

export interface PipelineStats {
  framesProcessed: number;
  droppedFrames: number;
  segmentsFinalized: number;
  segmentsDiscarded: number;
  partialTicksMissed: number;
}

/**
 * Wires capture, segmentation and decoding together.
 *
 *   source --tryPush--> FrameQueue --pop--> consumer
 *   consumer --> RollingWindow (partials) + Segmenter --segment--> FinalDecodeTrigger
 *
 * Everything user-visible goes out through the event bus.
 */
export class DictationPipeline extends EventEmitter {
  readonly bus: TranscriptEventBus;
  readonly scheduler = new DecodeScheduler();
  private readonly source: FrameSource;
  private readonly engine: STTEngine;
  private readonly queue: FrameQueue<AudioFrame>;
  private readonly window: RollingWindow;
  private readonly segmenter: Segmenter;
  private readonly partials: PartialDecodeLoop;
  private readonly finals: FinalDecodeTrigger;
  private _status: SessionStatus = 'idle';
  private consumer: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private framesSinceStatus = 0;
  private lastVadActive = false;
  private _framesProcessed = 0;
  private _segmentsFinalized = 0;

  constructor(
    private readonly settings: AppSettings,
    deps: DictationPipelineDeps,
  ) {
    super();
    const { audio, vad, partials, engine } = settings;

    this.source = deps.source;
    this.engine = deps.engine;
    this.bus = deps.bus ?? new TranscriptEventBus();
    this.queue = new FrameQueue(Math.max(1, Math.floor(audio.queueCapacityMs / audio.frameMs)));
    this.window = new RollingWindow(partials.windowMs, audio.frameMs);
    this.segmenter = new Segmenter(deps.classifier ?? new EnergyClassifier(), { ...vad, frameMs: audio.frameMs });

    const request = { language: engine.language, task: engine.task };
    this.finals = new FinalDecodeTrigger(this.scheduler, this.engine, this.bus, request);
    this.partials = new PartialDecodeLoop(
      {
        window: this.window,
        scheduler: this.scheduler,
        engine: this.engine,
        bus: this.bus,
        isActive: () => this.segmenter.state !== 'silence',
      },
      { ...partials, ...request },
    );
  }

  get status(): SessionStatus {
    return this._status;
  }

  get isRecording(): boolean {
    return this._status === 'recording';
  }

  get stats(): PipelineStats {
    return {
      framesProcessed: this._framesProcessed,
      droppedFrames: this.droppedFrames(),
      segmentsFinalized: this._segmentsFinalized,
      segmentsDiscarded: this.segmenter.discardedSegments,
      partialTicksMissed: this.partials.missedTicks,
    };
  }

  async start(): Promise<void> {
    if (this._status !== 'idle') return;

    if (!this.engine.isReady) {
      await this.engine.init();
    }

    this.queue.reset();
    this.window.clear();
    this.segmenter.reset();
    this.framesSinceStatus = 0;
    this.lastVadActive = false;
    this._framesProcessed = 0;
    this._segmentsFinalized = 0;
    this._status = 'recording';

    this.consumer = this.consume();
    this.partials.start();
    this.source.start(this.queue, (error) => this.onCaptureFailure(error));
    // A source can fail while starting; shutdown is already under way then.
    if (this._status !== 'recording') return;

    console.log('[Pipeline] Started');
    this.emit('started');
  }

  /**
   * Cooperative shutdown: no decode is cancelled. Frames already queued are
   * still segmented and any open segment is flushed to a final.
   */
  stop(): Promise<void> {
    if (this._status === 'idle') return Promise.resolve();
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  toggle(): Promise<void> {
    return this._status === 'idle' ? this.start() : this.stop();
  }

  private async shutdown(): Promise<void> {
    this._status = 'stopping';

    this.source.stop();
    await this.partials.stop();

    this.queue.close();
    if (this.consumer) {
      await this.consumer;
      this.consumer = null;
    }

    const tail = this.segmenter.flush();
    if (tail) {
      this.window.clear();
      this.submitFinal(tail);
    }
    await this.finals.drain();

    this.publishStatus();
    this._status = 'idle';
    console.log(
      `[Pipeline] Stopped (frames=${this._framesProcessed}, finals=${this._segmentsFinalized}, dropped=${this.droppedFrames()})`,
    );
    this.emit('stopped');
  }

  private async consume(): Promise<void> {
    for (;;) {
      const frame = await this.queue.pop(CONSUMER_POLL_MS);
      if (frame) {
        this.handleFrame(frame);
      } else if (this.queue.closed) {
        return;
      }
    }
  }

  private handleFrame(frame: AudioFrame): void {
    this._framesProcessed++;
    this.window.push(frame);

    const result = this.segmenter.process(frame);
    if (result.segment) {
      // Nothing from this utterance may leak into the next preview.
      this.window.clear();
      this.submitFinal(result.segment);
    }

    this.framesSinceStatus++;
    if (result.isActive !== this.lastVadActive || this.framesSinceStatus >= this.settings.status.intervalFrames) {
      this.lastVadActive = result.isActive;
      this.publishStatus(result.levelDbfs);
    }
  }

  private submitFinal(segment: CompletedSegment): void {
    this._segmentsFinalized++;
    void this.finals.submit(segment);
  }

  private publishStatus(levelDbfs = SILENCE_FLOOR_DBFS): StatusEvent {
    this.framesSinceStatus = 0;
    return this.bus.publish({
      type: 'status',
      levelDbfs,
      vadActive: this.segmenter.state !== 'silence',
      state: this.segmenter.state,
      droppedFrames: this.droppedFrames(),
    });
  }

  private droppedFrames(): number {
    return this.queue.dropped + this.source.failedChunks;
  }

  private onCaptureFailure(error: CaptureError): void {
    this.bus.publish({ type: 'error', kind: error.kind, message: error.message, fatal: true });
    this.stop().catch((err: unknown) => {
      console.error('[Pipeline] Shutdown after capture failure failed:', describeError(err));
    });
  }
}
