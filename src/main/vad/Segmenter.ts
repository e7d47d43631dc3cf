import { v4 as uuid } from 'uuid';
import { CompletedSegment, SegmenterState } from '../../shared/types/segment';
import { VadSettings } from '../../shared/types/settings';
import { AudioFrame, FRAME_MS, concatFrames, rmsDbfs } from '../audio/AudioFrame';
import { ClassifierError, describeError } from '../errors';
import { VoiceActivityClassifier } from './VoiceActivityClassifier';

export interface SegmenterOptions extends VadSettings {
  frameMs: number;
}

export interface SegmenterResult {
  /** Present only on the frame that closes a segment. */
  segment?: CompletedSegment;
  state: SegmenterState;
  /** True while a segment is open (active or hangover). */
  isActive: boolean;
  isSpeech: boolean;
  levelDbfs: number;
}

export const DEFAULT_SEGMENTER_OPTIONS: SegmenterOptions = {
  aggressiveness: 2,
  frameMs: FRAME_MS,
  hangoverMs: 300,
  prerollMs: 150,
  minSegmentMs: 300,
};

interface SegmentBuffer {
  frames: AudioFrame[];
  prerollFrames: number;
  speechFrames: number;
  /** Set once a too-short segment has been granted one more hangover window. */
  extended: boolean;
}

/**
 * Speech/silence state machine with pre-roll and hangover.
 *
 *   silence  --speech-->  active  --silence-->  hangover
 *   hangover --speech-->  active
 *   hangover --hangoverMs of silence--> silence (segment closed)
 *
 * A segment whose voiced audio is shorter than `minSegmentMs` is not closed
 * when hangover runs out. It stays open for one more hangover window so a
 * following utterance can absorb it; if nothing arrives it is dropped.
 */
export class Segmenter {
  private _state: SegmenterState = 'silence';
  private buffer: SegmentBuffer | null = null;
  private preroll: AudioFrame[] = [];
  private trailingSilenceMs = 0;
  private classifierFailureStreak = 0;
  private _classifierFailures = 0;
  private _discarded = 0;
  private readonly prerollCapacity: number;

  constructor(
    private readonly classifier: VoiceActivityClassifier,
    private readonly options: SegmenterOptions = { ...DEFAULT_SEGMENTER_OPTIONS },
  ) {
    this.prerollCapacity = Math.max(0, Math.floor(options.prerollMs / options.frameMs));
  }

  get state(): SegmenterState {
    return this._state;
  }

  get hasOpenSegment(): boolean {
    return this.buffer !== null;
  }

  get classifierFailures(): number {
    return this._classifierFailures;
  }

  /** Segments dropped for being shorter than the minimum. */
  get discardedSegments(): number {
    return this._discarded;
  }

  process(frame: AudioFrame): SegmenterResult {
    const levelDbfs = rmsDbfs(frame.samples);
    const isSpeech = this.classify(frame);
    let segment: CompletedSegment | undefined;

    if (this.buffer === null) {
      if (isSpeech) {
        this.open(frame);
      } else {
        this.remember(frame);
      }
    } else {
      this.buffer.frames.push(frame);

      if (isSpeech) {
        this.buffer.speechFrames++;
        this.buffer.extended = false;
        this.trailingSilenceMs = 0;
        this._state = 'active';
      } else {
        this._state = 'hangover';
        this.trailingSilenceMs += this.options.frameMs;
        if (this.trailingSilenceMs >= this.options.hangoverMs) {
          segment = this.onHangoverElapsed();
        }
      }
    }

    return {
      segment,
      state: this._state,
      isActive: this._state !== 'silence',
      isSpeech,
      levelDbfs,
    };
  }

  /**
   * Close whatever is open, e.g. when capture stops mid-utterance.
   * Returns the segment if it is long enough to keep.
   */
  flush(): CompletedSegment | undefined {
    const buffer = this.buffer;
    if (!buffer) return undefined;

    const segment = this.isViable(buffer) ? this.freeze(buffer) : undefined;
    if (!segment) this._discarded++;
    this.toSilence();
    return segment;
  }

  /** Back to silence with fresh counters, for a new session. */
  reset(): void {
    this.toSilence();
    this.classifierFailureStreak = 0;
    this._classifierFailures = 0;
    this._discarded = 0;
  }

  private classify(frame: AudioFrame): boolean {
    try {
      const verdict = this.classifier.classify(frame.samples, this.options.aggressiveness) === 'speech';
      this.classifierFailureStreak = 0;
      return verdict;
    } catch (err) {
      this._classifierFailures++;
      if (this.classifierFailureStreak++ === 0) {
        const error = new ClassifierError(describeError(err), { cause: err });
        console.warn('[VAD] Classifier failed, treating frames as silence:', error.message);
      }
      return false;
    }
  }

  private open(frame: AudioFrame): void {
    this.buffer = {
      frames: [...this.preroll, frame],
      prerollFrames: this.preroll.length,
      speechFrames: 1,
      extended: false,
    };
    this.preroll = [];
    this.trailingSilenceMs = 0;
    this._state = 'active';
  }

  private remember(frame: AudioFrame): void {
    if (this.prerollCapacity === 0) return;

    this.preroll.push(frame);
    if (this.preroll.length > this.prerollCapacity) {
      this.preroll.shift();
    }
  }

  private onHangoverElapsed(): CompletedSegment | undefined {
    const buffer = this.buffer;
    if (!buffer) return undefined;

    if (this.isViable(buffer)) {
      const segment = this.freeze(buffer);
      this.toSilence();
      return segment;
    }

    if (!buffer.extended) {
      buffer.extended = true;
      this.trailingSilenceMs = 0;
      return undefined;
    }

    this._discarded++;
    this.toSilence();
    return undefined;
  }

  private isViable(buffer: SegmentBuffer): boolean {
    return buffer.speechFrames * this.options.frameMs >= this.options.minSegmentMs;
  }

  private freeze(buffer: SegmentBuffer): CompletedSegment {
    const { frames } = buffer;
    const frameMs = this.options.frameMs;

    return {
      id: uuid(),
      samples: concatFrames(frames),
      startedAt: frames[0].capturedAt,
      endedAt: frames[frames.length - 1].capturedAt,
      prerollMs: buffer.prerollFrames * frameMs,
      speechMs: buffer.speechFrames * frameMs,
      durationMs: frames.length * frameMs,
    };
  }

  private toSilence(): void {
    this.buffer = null;
    this.preroll = [];
    this.trailingSilenceMs = 0;
    this._state = 'silence';
  }
}
