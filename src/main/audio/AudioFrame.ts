export const SAMPLE_RATE = 16000;
export const FRAME_MS = 30;
export const SILENCE_FLOOR_DBFS = -120;

export interface AudioFrame {
  /** Capture order, starting at 0 for each session. */
  readonly index: number;
  readonly capturedAt: number;
  /** Mono samples normalized to [-1, 1]. */
  readonly samples: Float32Array;
}

export function samplesPerFrame(frameMs = FRAME_MS, sampleRate = SAMPLE_RATE): number {
  return Math.round((sampleRate * frameMs) / 1000);
}

export function samplesToMs(sampleCount: number, sampleRate = SAMPLE_RATE): number {
  return (sampleCount / sampleRate) * 1000;
}

/**
 * RMS level of a block in dB relative to full scale.
 */
export function rmsDbfs(samples: Float32Array): number {
  if (samples.length === 0) return SILENCE_FLOOR_DBFS;

  let sumSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i];
  }

  const rms = Math.sqrt(sumSquares / samples.length);
  if (rms <= 0) return SILENCE_FLOOR_DBFS;
  return Math.max(SILENCE_FLOOR_DBFS, 20 * Math.log10(rms));
}

export function concatFrames(frames: readonly AudioFrame[]): Float32Array {
  let total = 0;
  for (const frame of frames) total += frame.samples.length;

  const merged = new Float32Array(total);
  let writeOffset = 0;
  for (const frame of frames) {
    merged.set(frame.samples, writeOffset);
    writeOffset += frame.samples.length;
  }
  return merged;
}
