import { AudioFrame, FRAME_MS, SAMPLE_RATE, samplesPerFrame } from './AudioFrame';

/**
 * Turns the recorder's byte stream into fixed-size frames.
 * Expects 16-bit signed integer PCM (little-endian), mono, as produced
 * by node-record-lpcm16 with audioType: 'wav'.
 */
export class AudioProcessor {
  private readonly WAV_HEADER_SIZE = 44;
  private readonly frameSamples: number;
  private headerStripped = false;
  private pending: Float32Array;
  private pendingCount = 0;
  private carryByte: number | null = null;
  private nextIndex = 0;

  constructor(frameMs = FRAME_MS, sampleRate = SAMPLE_RATE, private readonly expectHeader = true) {
    this.frameSamples = samplesPerFrame(frameMs, sampleRate);
    this.pending = new Float32Array(this.frameSamples);
  }

  /**
   * Convert a chunk into zero or more complete frames. Samples that do not
   * fill a frame are kept for the next chunk, and so is an odd trailing byte.
   */
  push(chunk: Buffer, capturedAt = Date.now()): AudioFrame[] {
    let bytes = chunk;

    // WAV streams from SoX start with a 44-byte header on the first chunk.
    if (this.expectHeader && !this.headerStripped) {
      if (bytes.length <= this.WAV_HEADER_SIZE) {
        return [];
      }
      bytes = bytes.subarray(this.WAV_HEADER_SIZE);
      this.headerStripped = true;
    }

    if (this.carryByte !== null) {
      bytes = Buffer.concat([Buffer.from([this.carryByte]), bytes]);
      this.carryByte = null;
    }

    const frames: AudioFrame[] = [];
    const usable = bytes.length - (bytes.length % 2);

    for (let offset = 0; offset < usable; offset += 2) {
      this.pending[this.pendingCount++] = bytes.readInt16LE(offset) / 32768;

      if (this.pendingCount === this.frameSamples) {
        frames.push({ index: this.nextIndex++, capturedAt, samples: this.pending });
        this.pending = new Float32Array(this.frameSamples);
        this.pendingCount = 0;
      }
    }

    if (usable < bytes.length) {
      this.carryByte = bytes[bytes.length - 1];
    }

    return frames;
  }

  get bufferedSamples(): number {
    return this.pendingCount;
  }

  /**
   * Reset state (call when starting a new recording session).
   */
  reset(): void {
    this.headerStripped = false;
    this.pending = new Float32Array(this.frameSamples);
    this.pendingCount = 0;
    this.carryByte = null;
    this.nextIndex = 0;
  }
}
