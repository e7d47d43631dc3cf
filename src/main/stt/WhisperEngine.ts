import { EventEmitter } from 'events';
import { existsSync } from 'fs';
import { homedir } from 'os';
import path from 'path';
import type { OfflineRecognizer, OfflineRecognizerConfig } from 'sherpa-onnx-node';
import { WhisperTaskName } from '../../shared/types/settings';
import { EngineError, describeError } from '../errors';
import { SAMPLE_RATE, samplesToMs } from '../audio/AudioFrame';
import { DecodeRequest, STTEngine, STTResult } from './STTEngine';

export interface WhisperModelFiles {
  encoder: string;
  decoder: string;
  tokens: string;
}

interface LoadedConfig {
  language: string;
  task: WhisperTaskName;
}

/**
 * Where an unpacked `sherpa-onnx-whisper-<model>` release is looked for when
 * no directory is configured.
 */
export function defaultModelDir(modelId: string): string {
  return path.join(homedir(), '.cache', 'voxlane', 'models', `sherpa-onnx-whisper-${modelId}`);
}

/** int8 encoder, decoder and token table of a sherpa-onnx Whisper export. */
export function whisperModelFiles(modelDir: string, modelId: string): WhisperModelFiles {
  return {
    encoder: path.join(modelDir, `${modelId}-encoder.int8.onnx`),
    decoder: path.join(modelDir, `${modelId}-decoder.int8.onnx`),
    tokens: path.join(modelDir, `${modelId}-tokens.txt`),
  };
}

export function isEnglishOnly(modelId: string): boolean {
  return modelId.endsWith('.en');
}

/**
 * Whisper-based STT engine on sherpa-onnx native bindings.
 * Runs entirely offline from model files already on disk.
 *
 * Not reentrant: a second decode while one is running is rejected. Callers
 * serialize through the decode scheduler.
 */
export class WhisperEngine extends EventEmitter implements STTEngine {
  readonly name = 'whisper';
  private recognizer: OfflineRecognizer | null = null;
  private createRecognizer: ((config: OfflineRecognizerConfig) => OfflineRecognizer) | null = null;
  private loaded: LoadedConfig | null = null;
  private _isReady = false;
  private processing = false;
  private readonly files: WhisperModelFiles;

  get isReady(): boolean {
    return this._isReady;
  }

  /**
   * @param modelId - sherpa-onnx Whisper export name, e.g. `base.en` or `small`
   * @param modelDir - directory holding the model files
   */
  constructor(
    private readonly modelId = 'base.en',
    modelDir = defaultModelDir(modelId),
  ) {
    super();
    this.files = whisperModelFiles(modelDir, modelId);
  }

  async init(): Promise<void> {
    if (this._isReady) return;
    this.emit('status', `Loading Whisper ${this.modelId}...`);

    const missing = Object.values(this.files).filter((file) => !existsSync(file));
    if (missing.length > 0) {
      throw new EngineError(`Whisper model files not found: ${missing.join(', ')}`);
    }

    try {
      const { OfflineRecognizer } = await import('sherpa-onnx-node');
      this.createRecognizer = (config) => new OfflineRecognizer(config);
      this.load({ language: '', task: 'transcribe' });
    } catch (err) {
      throw new EngineError(`Failed to load ${this.modelId}: ${describeError(err)}`, { cause: err });
    }

    this._isReady = true;
    this.emit('status', 'Whisper model loaded');
    this.emit('ready');
  }

  async decode(samples: Float32Array, request: DecodeRequest): Promise<STTResult> {
    if (!this._isReady || !this.recognizer) {
      throw new EngineError('Whisper engine is not initialized');
    }
    if (this.processing) {
      throw new EngineError('Whisper engine is busy; decodes must not overlap');
    }
    if (samples.length === 0) {
      throw new EngineError('Cannot decode an empty buffer');
    }

    this.processing = true;
    const startedAt = Date.now();
    const audioMs = samplesToMs(samples.length);

    try {
      const recognizer = this.recognizerFor(request);
      const stream = recognizer.createStream();
      stream.acceptWaveform({ samples, sampleRate: SAMPLE_RATE });
      recognizer.decode(stream);

      const text = (recognizer.getResult(stream).text ?? '').replace(/\s+/g, ' ').trim();
      const decodeMs = Date.now() - startedAt;

      if (request.isFinal) {
        console.log(`[Whisper] Final (${(audioMs / 1000).toFixed(1)}s audio, ${decodeMs}ms): "${text}"`);
      }

      return { text, timing: { decodeMs, audioMs } };
    } catch (err) {
      throw new EngineError(`Whisper decode failed: ${describeError(err)}`, { cause: err });
    } finally {
      this.processing = false;
    }
  }

  destroy(): void {
    this.recognizer = null;
    this.loaded = null;
    this._isReady = false;
  }

  /**
   * Language and task are part of the recognizer's config, so a request for
   * a different pair reloads it. English-only models take neither.
   */
  private recognizerFor(request: DecodeRequest): OfflineRecognizer {
    const wanted: LoadedConfig = isEnglishOnly(this.modelId)
      ? { language: '', task: 'transcribe' }
      : { language: request.language, task: request.task };

    const { loaded, recognizer } = this;
    if (recognizer && loaded && loaded.language === wanted.language && loaded.task === wanted.task) {
      return recognizer;
    }
    console.log(`[Whisper] Task set to: ${wanted.task} (${wanted.language || 'auto'})`);
    return this.load(wanted);
  }

  private load(config: LoadedConfig): OfflineRecognizer {
    if (!this.createRecognizer) {
      throw new EngineError('sherpa-onnx is not loaded');
    }

    const recognizer = this.createRecognizer({
      featConfig: { sampleRate: SAMPLE_RATE, featureDim: 80 },
      modelConfig: {
        whisper: {
          encoder: this.files.encoder,
          decoder: this.files.decoder,
          language: config.language,
          task: config.task,
        },
        tokens: this.files.tokens,
        numThreads: 2,
        debug: 0,
        provider: 'cpu',
      },
    });
    this.recognizer = recognizer;
    this.loaded = config;
    return recognizer;
  }
}
