export type SegmenterState = 'silence' | 'active' | 'hangover';

/**
 * A finalized utterance: pre-roll, speech and the hangover tail, frozen at the
 * moment the segmenter returns to silence.
 */
export interface CompletedSegment {
  id: string;
  samples: Float32Array;
  /** Capture time of the first frame (pre-roll included). */
  startedAt: number;
  /** Capture time of the last frame appended. */
  endedAt: number;
  prerollMs: number;
  speechMs: number;
  durationMs: number;
}
