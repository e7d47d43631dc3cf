import { FinalEvent } from '../../shared/types/events';
import { TranscriptSegment } from '../../shared/types/transcript';

export function toTranscriptSegment(event: FinalEvent): TranscriptSegment {
  return {
    id: event.segmentId,
    text: event.text,
    timestamp: event.timestamp,
    latencyMs: event.latencyMs,
    failed: event.error !== undefined,
  };
}

/**
 * Bounded history of finalized segments for late-joining viewers and the
 * transcript written on exit.
 */
export class TranscriptBuffer {
  private segments: TranscriptSegment[] = [];

  constructor(private readonly maxSegments = 1000) {}

  add(segment: TranscriptSegment): void {
    this.segments.push(segment);
    if (this.segments.length > this.maxSegments) {
      this.segments = this.segments.slice(this.segments.length - this.maxSegments);
    }
  }

  addFinal(event: FinalEvent): void {
    this.add(toTranscriptSegment(event));
  }

  getRecent(count: number): TranscriptSegment[] {
    return count > 0 ? this.segments.slice(-count) : [];
  }

  get length(): number {
    return this.segments.length;
  }

  /**
   * Export as timestamped text (`[HH:MM:SS] text`, UTC).
   */
  exportTimestamped(): string {
    return this.spoken()
      .map((s) => `[${new Date(s.timestamp).toISOString().slice(11, 19)}] ${s.text}`)
      .join('\n');
  }

  private spoken(): TranscriptSegment[] {
    return this.segments.filter((s) => !s.failed && s.text.length > 0);
  }
}
