export interface TranscriptSegment {
  id: string;
  text: string;
  timestamp: number;
  latencyMs: number;
  failed: boolean;
}
