import { WhisperTaskName } from '../../shared/types/settings';

export interface DecodeRequest {
  /** Final decodes cover a whole segment; partial decodes a rolling window. */
  isFinal: boolean;
  language: string;
  task: WhisperTaskName;
}

export interface DecodeTiming {
  decodeMs: number;
  audioMs: number;
}

export interface STTResult {
  text: string;
  timing: DecodeTiming;
  confidence?: number;
}

/**
 * Speech-to-text capability. Implementations are safe to call repeatedly but
 * not concurrently; the decode scheduler guarantees one call at a time.
 * Failures reject with `EngineError`.
 */
export interface STTEngine {
  readonly name: string;
  readonly isReady: boolean;

  /** Load the model. */
  init(): Promise<void>;

  /** Decode 16 kHz mono samples normalized to [-1, 1]. */
  decode(samples: Float32Array, request: DecodeRequest): Promise<STTResult>;

  /** Release resources. */
  destroy(): void;
}
