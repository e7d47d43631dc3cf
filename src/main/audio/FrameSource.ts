import { CaptureError } from '../errors';
import { AudioFrame } from './AudioFrame';
import { FrameQueue } from './FrameQueue';

/**
 * Anything that produces frames into the queue. Implementations must never
 * block or throw from their producing callback; a device failure is reported
 * once through `onFatal`.
 */
export interface FrameSource {
  readonly isRecording: boolean;
  /** Input the source had to throw away before it became a frame. */
  readonly failedChunks: number;
  start(queue: FrameQueue<AudioFrame>, onFatal: (error: CaptureError) => void): void;
  stop(): void;
}
