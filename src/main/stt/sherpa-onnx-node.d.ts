declare module 'sherpa-onnx-node' {
  interface WhisperModelConfig {
    encoder: string;
    decoder: string;
    /** Empty for automatic language detection. */
    language?: string;
    task?: 'transcribe' | 'translate';
    tailPaddings?: number;
  }

  interface OfflineModelConfig {
    whisper: WhisperModelConfig;
    tokens: string;
    numThreads?: number;
    debug?: number;
    provider?: string;
  }

  interface OfflineRecognizerConfig {
    featConfig?: { sampleRate: number; featureDim: number };
    modelConfig: OfflineModelConfig;
    decodingMethod?: string;
  }

  interface OfflineRecognitionResult {
    text?: string;
    lang?: string;
    tokens?: string[];
    timestamps?: number[];
  }

  class OfflineStream {
    acceptWaveform(wave: { samples: Float32Array; sampleRate: number }): void;
  }

  class OfflineRecognizer {
    constructor(config: OfflineRecognizerConfig);
    createStream(): OfflineStream;
    decode(stream: OfflineStream): void;
    getResult(stream: OfflineStream): OfflineRecognitionResult;
  }

  const version: string;

  export {
    OfflineModelConfig,
    OfflineRecognitionResult,
    OfflineRecognizer,
    OfflineRecognizerConfig,
    OfflineStream,
    WhisperModelConfig,
    version,
  };
}
