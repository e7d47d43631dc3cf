import { VadAggressiveness } from '../../shared/types/settings';
import { rmsDbfs } from '../audio/AudioFrame';

export type FrameClass = 'speech' | 'silence';

/**
 * Per-frame binary speech detector. Implementations are stateless per frame;
 * higher aggressiveness means fewer false positives and more risk of
 * clipping quiet speech.
 */
export interface VoiceActivityClassifier {
  classify(samples: Float32Array, aggressiveness: VadAggressiveness): FrameClass;
}

/** dBFS gate per aggressiveness level 0..3. */
const LEVEL_GATES_DBFS: readonly number[] = [-50, -45, -40, -35];

/** Zero-crossing ceiling per level. Broadband hiss crosses far more often than voiced speech. */
const ZCR_CEILINGS: readonly number[] = [0.6, 0.5, 0.45, 0.4];

export function zeroCrossingRate(samples: Float32Array): number {
  if (samples.length < 2) return 0;

  let crossings = 0;
  for (let i = 1; i < samples.length; i++) {
    if ((samples[i - 1] >= 0) !== (samples[i] >= 0)) crossings++;
  }
  return crossings / (samples.length - 1);
}

/**
 * Energy + zero-crossing detector. Good enough for close-talking
 * microphones; swap in a model-based classifier for noisy rooms.
 */
export class EnergyClassifier implements VoiceActivityClassifier {
  classify(samples: Float32Array, aggressiveness: VadAggressiveness): FrameClass {
    if (samples.length === 0) return 'silence';

    const level = rmsDbfs(samples);
    if (level < LEVEL_GATES_DBFS[aggressiveness]) return 'silence';

    return zeroCrossingRate(samples) <= ZCR_CEILINGS[aggressiveness] ? 'speech' : 'silence';
  }
}
