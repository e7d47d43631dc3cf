import { execFile } from 'child_process';
import { promisify } from 'util';
import { record, Recording } from 'node-record-lpcm16';
import { Readable } from 'stream';
import { AudioSettings } from '../../shared/types/settings';
import { AudioDevice } from '../../shared/types/network';
import { CaptureError, describeError } from '../errors';
import { AudioFrame } from './AudioFrame';
import { AudioProcessor } from './AudioProcessor';
import { FrameQueue } from './FrameQueue';
import { FrameSource } from './FrameSource';

const execFileAsync = promisify(execFile);

/**
 * Microphone frame source backed by SoX through node-record-lpcm16.
 */
export class AudioCaptureManager implements FrameSource {
  private recording: Recording | null = null;
  private stream: Readable | null = null;
  private processor: AudioProcessor;
  private queue: FrameQueue<AudioFrame> | null = null;
  private onFatal: ((error: CaptureError) => void) | null = null;
  private _isRecording = false;
  private _failedChunks = 0;
  private _rejectedFrames = 0;

  constructor(private readonly settings: AudioSettings) {
    this.processor = new AudioProcessor(settings.frameMs, settings.sampleRate);
  }

  get isRecording(): boolean {
    return this._isRecording;
  }

  /** Chunks that could not be converted into frames. */
  get failedChunks(): number {
    return this._failedChunks;
  }

  /** Frames the queue refused. */
  get rejectedFrames(): number {
    return this._rejectedFrames;
  }

  start(queue: FrameQueue<AudioFrame>, onFatal: (error: CaptureError) => void): void {
    if (this._isRecording) {
      this.stop();
    }

    this.queue = queue;
    this.onFatal = onFatal;
    this.processor.reset();
    this._failedChunks = 0;
    this._rejectedFrames = 0;

    try {
      // On macOS, SoX uses AUDIODEV env var for device selection
      if (process.platform === 'darwin') {
        if (this.settings.deviceId !== 'default') {
          process.env.AUDIODEV = this.settings.deviceId;
        } else {
          delete process.env.AUDIODEV;
        }
      }

      const deviceParam =
        process.platform !== 'darwin' && this.settings.deviceId !== 'default'
          ? this.settings.deviceId
          : undefined;

      const recording = record({
        sampleRate: this.settings.sampleRate,
        channels: 1,
        audioType: 'wav',
        recorder: 'sox',
        threshold: 0,
        endOnSilence: false,
        device: deviceParam,
      });
      const stream = recording.stream();
      this.recording = recording;
      this.stream = stream;
      this._isRecording = true;

      // Events from a recorder that was stopped or replaced are stale.
      const isCurrent = (): boolean => this._isRecording && this.recording === recording;

      stream.on('data', (chunk: Buffer) => {
        if (isCurrent()) this.handleChunk(chunk);
      });

      // The recorder reports a non-zero SoX exit as a plain string.
      stream.on('error', (err: unknown) => {
        if (isCurrent()) {
          this.fail(new CaptureError(`Audio stream error: ${describeError(err)}`, { cause: err }));
        }
      });

      recording.process.on('error', (err: Error) => {
        if (isCurrent()) {
          this.fail(new CaptureError(`Audio capture process failed: ${err.message}`, { cause: err }));
        }
      });

      stream.on('end', () => {
        // Let a pending process error report the real reason first.
        setImmediate(() => {
          if (isCurrent()) this.fail(new CaptureError('Audio stream ended unexpectedly'));
        });
      });

      recording.process.on('exit', (code: number | null) => {
        if (code !== 0 && isCurrent()) {
          this.fail(new CaptureError(`Audio capture process exited unexpectedly (code ${code})`));
        }
      });

      console.log(`[Audio] Capture started (device=${this.settings.deviceId}, ${this.settings.sampleRate} Hz)`);
    } catch (err) {
      this.fail(new CaptureError(`Failed to start audio capture: ${describeError(err)}`, { cause: err }));
    }
  }

  stop(): void {
    // Refuse frames first so nothing lands in the queue after stop returns.
    const wasRecording = this._isRecording;
    this._isRecording = false;

    if (this.recording) {
      try {
        this.recording.stop();
      } catch (err) {
        console.warn('[Audio] Recorder already gone on stop:', describeError(err));
      }
      this.recording = null;
      this.stream = null;
      delete process.env.AUDIODEV;
    }

    this.queue = null;
    this.onFatal = null;

    if (wasRecording) {
      console.log(
        `[Audio] Capture stopped (rejected frames=${this._rejectedFrames}, failed chunks=${this._failedChunks})`,
      );
    }
  }

  async listDevices(): Promise<AudioDevice[]> {
    const devices: AudioDevice[] = [{ deviceId: 'default', label: 'System Default', kind: 'audioinput' }];

    try {
      if (process.platform === 'darwin') {
        devices.push(...(await this.listDevicesMacOS()));
      } else if (process.platform === 'linux') {
        devices.push(...(await this.listDevicesLinux()));
      }
    } catch (err) {
      console.error('[Audio] Failed to enumerate audio devices:', describeError(err));
    }

    return devices;
  }

  private handleChunk(chunk: Buffer): void {
    const queue = this.queue;
    if (!this._isRecording || !queue) return;

    let frames: AudioFrame[];
    try {
      frames = this.processor.push(chunk);
    } catch {
      this._failedChunks++;
      return;
    }

    for (const frame of frames) {
      if (!queue.tryPush(frame)) {
        this._rejectedFrames++;
      }
    }
  }

  private fail(error: CaptureError): void {
    const onFatal = this.onFatal;
    console.error('[Audio]', error.message);
    this.stop();
    onFatal?.(error);
  }

  private async listDevicesMacOS(): Promise<AudioDevice[]> {
    const { stdout } = await execFileAsync('system_profiler', ['SPAudioDataType']);
    const devices: AudioDevice[] = [];

    // Each device block starts with an 8-space indented name line.
    for (const block of stdout.split(/\n(?=\s{8}\S)/)) {
      const nameMatch = block.match(/^\s{8}(.+?):\s*$/m);
      if (!nameMatch || !/Input Channels:\s*\d+/i.test(block)) continue;

      const name = nameMatch[1].trim();
      devices.push({ deviceId: name, label: name, kind: 'audioinput' });
    }

    return devices;
  }

  private async listDevicesLinux(): Promise<AudioDevice[]> {
    const { stdout } = await execFileAsync('arecord', ['-l']);
    const devices: AudioDevice[] = [];

    // card 0: PCH [HDA Intel PCH], device 0: ALC269VC Analog [ALC269VC Analog]
    for (const line of stdout.split('\n')) {
      const match = line.match(/^card\s+(\d+):\s+\S+\s+\[(.+?)\],\s+device\s+(\d+):\s+(.+?)\s+\[/);
      if (!match) continue;

      const [, card, cardName, device, deviceName] = match;
      devices.push({ deviceId: `hw:${card},${device}`, label: `${cardName} - ${deviceName}`, kind: 'audioinput' });
    }

    return devices;
  }
}
