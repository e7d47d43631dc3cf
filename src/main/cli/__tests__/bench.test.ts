import { DEFAULT_SETTINGS } from '../../../shared/types/settings';
import { AudioFrame } from '../../audio/AudioFrame';
import { FrameQueue } from '../../audio/FrameQueue';
import { CaptureError } from '../../errors';
import { benchCommand } from '../bench';

const fakes = vi.hoisted(() => {
  const state: { destroyed: number; captureError: CaptureError | null } = { destroyed: 0, captureError: null };
  return state;
});

vi.mock('../../config/loadSettings', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../config/loadSettings')>()),
  loadSettings: async () => DEFAULT_SETTINGS,
}));

vi.mock('../../stt/WhisperEngine', () => ({
  defaultModelDir: (modelId: string) => `/models/${modelId}`,
  WhisperEngine: class {
    async init(): Promise<void> {
      return undefined;
    }
    async decode(samples: Float32Array) {
      return { text: 'testing one two', timing: { decodeMs: 250, audioMs: samples.length / 16 } };
    }
    destroy(): void {
      fakes.destroyed++;
    }
  },
}));

vi.mock('../../audio/AudioCaptureManager', () => ({
  AudioCaptureManager: class {
    start(queue: FrameQueue<AudioFrame>, onFatal: (error: CaptureError) => void): void {
      if (fakes.captureError) {
        onFatal(fakes.captureError);
        return;
      }
      queue.tryPush({ index: 0, capturedAt: 0, samples: new Float32Array(16000) });
    }
    stop(): void {
      return undefined;
    }
  },
}));

describe('benchCommand', () => {
  beforeEach(() => {
    fakes.destroyed = 0;
    fakes.captureError = null;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('reports audio seconds per compute second', async () => {
    const result = await benchCommand({ seconds: '0.01' });

    expect(result).toEqual({ audioMs: 1000, decodeMs: 250, rtf: 4, text: 'testing one two' });
    expect(fakes.destroyed).toBe(1);
  });

  test('releases the engine when capture fails', async () => {
    fakes.captureError = new CaptureError('no input device');

    await expect(benchCommand({ seconds: '0.01' })).rejects.toThrow('no input device');
    expect(fakes.destroyed).toBe(1);
  });

  test('rejects a non-positive duration before loading anything', async () => {
    await expect(benchCommand({ seconds: '0' })).rejects.toThrow('--seconds must be a positive number (got 0)');
    expect(fakes.destroyed).toBe(0);
  });
});
