import { AudioCaptureManager } from '../audio/AudioCaptureManager';
import { AudioFrame, concatFrames, samplesToMs } from '../audio/AudioFrame';
import { FrameQueue } from '../audio/FrameQueue';
import { loadSettings } from '../config/loadSettings';
import { CaptureError } from '../errors';
import { STTResult } from '../stt/STTEngine';
import { WhisperEngine, defaultModelDir } from '../stt/WhisperEngine';
import { RunOptions, applyRunOptions } from './options';

export interface BenchOptions extends Pick<RunOptions, 'config' | 'model' | 'language' | 'device'> {
  seconds: string;
}

export interface BenchResult {
  audioMs: number;
  decodeMs: number;
  /** Seconds of audio transcribed per second of compute. */
  rtf: number;
  text: string;
}

export function realTimeFactor(audioMs: number, decodeMs: number): number {
  return decodeMs > 0 ? audioMs / decodeMs : 0;
}

function recordFor(capture: AudioCaptureManager, queue: FrameQueue<AudioFrame>, ms: number): Promise<AudioFrame[]> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      capture.stop();
      resolve(queue.drain());
    }, ms);

    capture.start(queue, (error: CaptureError) => {
      clearTimeout(timer);
      reject(error);
    });
  });
}

/** Record a few seconds from the microphone and time a single final decode. */
export async function benchCommand(options: BenchOptions): Promise<BenchResult> {
  const settings = applyRunOptions(await loadSettings({ configPath: options.config }), options);
  const seconds = Number(options.seconds);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new RangeError(`--seconds must be a positive number (got ${options.seconds})`);
  }

  const engine = new WhisperEngine(
    settings.engine.modelId,
    settings.engine.modelDir || defaultModelDir(settings.engine.modelId),
  );

  try {
    await engine.init();

    const capacity = Math.ceil((seconds * 1000) / settings.audio.frameMs) + 16;
    const capture = new AudioCaptureManager(settings.audio);

    console.log(`Recording ${seconds}s, speak now...`);
    const samples = concatFrames(await recordFor(capture, new FrameQueue<AudioFrame>(capacity), seconds * 1000));
    if (samples.length === 0) {
      throw new CaptureError('No audio was captured');
    }

    const result = await engine.decode(samples, {
      isFinal: true,
      language: settings.engine.language,
      task: settings.engine.task,
    });
    return report(samples, result);
  } finally {
    engine.destroy();
  }
}

function report(samples: Float32Array, result: STTResult): BenchResult {
  const audioMs = samplesToMs(samples.length);
  const bench: BenchResult = {
    audioMs,
    decodeMs: result.timing.decodeMs,
    rtf: realTimeFactor(audioMs, result.timing.decodeMs),
    text: result.text,
  };

  console.log(`Text: ${bench.text || '(empty)'}`);
  console.log(
    `Done. compute=${(bench.decodeMs / 1000).toFixed(2)}s, audio=${(audioMs / 1000).toFixed(2)}s, RTF=${bench.rtf.toFixed(2)}`,
  );
  return bench;
}
