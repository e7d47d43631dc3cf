export type SinkName = 'stdout' | 'clipboard' | 'paste' | 'file';
export type VadAggressiveness = 0 | 1 | 2 | 3;
export type WhisperTaskName = 'transcribe' | 'translate';

export interface AudioSettings {
  deviceId: string;
  sampleRate: number;
  frameMs: number;
  /** Upper bound on audio buffered between capture and segmentation. */
  queueCapacityMs: number;
}

export interface VadSettings {
  aggressiveness: VadAggressiveness;
  hangoverMs: number;
  prerollMs: number;
  minSegmentMs: number;
}

export interface PartialSettings {
  enabled: boolean;
  windowMs: number;
  cadenceMs: number;
  minAudioMs: number;
}

export interface EngineSettings {
  modelId: string;
  language: string;
  task: WhisperTaskName;
  /** Unpacked sherpa-onnx Whisper export; empty for the default location. */
  modelDir: string;
}

export interface OutputSettings {
  sink: SinkName;
  fileDir: string;
  separator: string;
}

export interface NetworkSettings {
  enabled: boolean;
  port: number;
}

export interface StatusSettings {
  intervalFrames: number;
}

export interface AppSettings {
  audio: AudioSettings;
  vad: VadSettings;
  partials: PartialSettings;
  engine: EngineSettings;
  output: OutputSettings;
  network: NetworkSettings;
  status: StatusSettings;
}

export const DEFAULT_SETTINGS: AppSettings = {
  audio: {
    deviceId: 'default',
    sampleRate: 16000,
    frameMs: 30,
    queueCapacityMs: 10000,
  },
  vad: {
    aggressiveness: 2,
    hangoverMs: 300,
    prerollMs: 150,
    minSegmentMs: 300,
  },
  partials: {
    enabled: true,
    windowMs: 5000,
    cadenceMs: 1000,
    minAudioMs: 1200,
  },
  engine: {
    modelId: 'base.en',
    language: 'en',
    task: 'transcribe',
    modelDir: '',
  },
  output: {
    sink: 'stdout',
    fileDir: '~/Documents/Dictation',
    separator: '\n',
  },
  network: {
    enabled: false,
    port: 8080,
  },
  status: {
    intervalFrames: 5,
  },
};
