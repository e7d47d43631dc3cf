import { AudioFrame } from '../audio/AudioFrame';
import { FrameQueue } from '../audio/FrameQueue';
import { FrameSource } from '../audio/FrameSource';
import { CaptureError } from '../errors';
import { DecodeRequest, STTEngine, STTResult } from '../stt/STTEngine';
import { VoiceActivityClassifier } from '../vad/VoiceActivityClassifier';

export const TEST_FRAME_SAMPLES = 480;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * 30 ms frame whose first sample marks speech and whose second sample
 * encodes its index, so tests can check ordering after concatenation.
 */
export function makeFrame(index: number, speech: boolean): AudioFrame {
  const samples = new Float32Array(TEST_FRAME_SAMPLES);
  samples[0] = speech ? 0.9 : 0;
  samples[1] = index / 1000;
  return { index, capturedAt: 1000 + index * 30, samples };
}

/** Frames from a run-length pattern such as `[['silence', 5], ['speech', 67]]`. */
export function framesFrom(pattern: Array<['speech' | 'silence', number]>, firstIndex = 0): AudioFrame[] {
  const frames: AudioFrame[] = [];
  let index = firstIndex;
  for (const [kind, count] of pattern) {
    for (let i = 0; i < count; i++) {
      frames.push(makeFrame(index++, kind === 'speech'));
    }
  }
  return frames;
}

/** Classifies by the marker sample set in `makeFrame`. */
export const markerClassifier: VoiceActivityClassifier = {
  classify: (samples) => (samples[0] > 0.5 ? 'speech' : 'silence'),
};

export interface EngineCall {
  samples: Float32Array;
  request: DecodeRequest;
}

/** Answers every decode straight away. */
export class ScriptedEngine implements STTEngine {
  readonly name = 'scripted';
  isReady = true;
  readonly calls: EngineCall[] = [];

  constructor(private readonly respond: (request: DecodeRequest) => STTResult | Error = () => ({
    text: ' hello world ',
    timing: { decodeMs: 5, audioMs: 0 },
  })) {}

  async init(): Promise<void> {
    this.isReady = true;
  }

  async decode(samples: Float32Array, request: DecodeRequest): Promise<STTResult> {
    this.calls.push({ samples, request });
    const result = this.respond(request);
    if (result instanceof Error) throw result;
    return result;
  }

  destroy(): void {
    this.isReady = false;
  }
}

export interface PendingDecode extends EngineCall {
  result: Deferred<STTResult>;
}

/** Holds every decode until the test settles it. */
export class DeferredEngine implements STTEngine {
  readonly name = 'deferred';
  readonly isReady = true;
  readonly calls: PendingDecode[] = [];

  async init(): Promise<void> {
    return undefined;
  }

  decode(samples: Float32Array, request: DecodeRequest): Promise<STTResult> {
    const result = deferred<STTResult>();
    this.calls.push({ samples, request, result });
    return result.promise;
  }

  /** Settle call `index` with the given text. */
  answer(index: number, text: string): void {
    this.calls[index].result.resolve({ text, timing: { decodeMs: 1, audioMs: 0 } });
  }

  destroy(): void {
    return undefined;
  }
}

/** In-memory frame source driven by the test. */
export class FakeSource implements FrameSource {
  failedChunks = 0;
  private queue: FrameQueue<AudioFrame> | null = null;
  private onFatal: ((error: CaptureError) => void) | null = null;

  get isRecording(): boolean {
    return this.queue !== null;
  }

  start(queue: FrameQueue<AudioFrame>, onFatal: (error: CaptureError) => void): void {
    this.queue = queue;
    this.onFatal = onFatal;
  }

  stop(): void {
    this.queue = null;
    this.onFatal = null;
  }

  /** Push frames the way a capture callback would; returns how many were accepted. */
  emit(frames: AudioFrame[]): number {
    const queue = this.queue;
    if (!queue) return 0;
    return frames.filter((frame) => queue.tryPush(frame)).length;
  }

  fail(error: CaptureError): void {
    const onFatal = this.onFatal;
    this.stop();
    onFatal?.(error);
  }
}
