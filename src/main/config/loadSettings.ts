import { readFile } from 'fs/promises';
import { homedir } from 'os';
import path from 'path';
import {
  AppSettings,
  DEFAULT_SETTINGS,
  SinkName,
  VadAggressiveness,
  WhisperTaskName,
} from '../../shared/types/settings';
import { ConfigError, describeError } from '../errors';

type RawSection = Record<string, unknown>;

const SINKS: readonly SinkName[] = ['stdout', 'clipboard', 'paste', 'file'];
const TASKS: readonly WhisperTaskName[] = ['transcribe', 'translate'];
const AGGRESSIVENESS: readonly VadAggressiveness[] = [0, 1, 2, 3];
const FRAME_SIZES_MS: readonly number[] = [10, 20, 30];

export function defaultConfigPath(): string {
  return path.join(homedir(), '.voxlane.json');
}

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads one section of a loosely-typed settings object, falling back to the
 * current value for anything missing and noting anything of the wrong type.
 */
class SectionReader {
  constructor(
    private readonly raw: RawSection,
    private readonly section: string,
    private readonly problems: string[],
  ) {}

  number(key: string, fallback: number): number {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    this.problems.push(`${this.section}.${key} must be a number`);
    return fallback;
  }

  string(key: string, fallback: string): string {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value === 'string') return value;
    this.problems.push(`${this.section}.${key} must be a string`);
    return fallback;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    this.problems.push(`${this.section}.${key} must be true or false`);
    return fallback;
  }

  oneOf<T extends string | number>(key: string, allowed: readonly T[], fallback: T): T {
    const value = this.raw[key];
    if (value === undefined) return fallback;
    const match = allowed.find((candidate) => candidate === value);
    if (match !== undefined) return match;
    this.problems.push(`${this.section}.${key} must be one of ${allowed.join(', ')}`);
    return fallback;
  }
}

/** Overlay a parsed (untrusted) settings object onto `base`. */
export function mergeSettings(base: AppSettings, raw: unknown, problems: string[] = []): AppSettings {
  if (!isRecord(raw)) {
    problems.push('settings must be a JSON object');
    return base;
  }

  const reader = (section: keyof AppSettings): SectionReader => {
    const value = raw[section];
    if (value !== undefined && !isRecord(value)) {
      problems.push(`${section} must be an object`);
    }
    return new SectionReader(isRecord(value) ? value : {}, section, problems);
  };

  const audio = reader('audio');
  const vad = reader('vad');
  const partials = reader('partials');
  const engine = reader('engine');
  const output = reader('output');
  const network = reader('network');
  const status = reader('status');

  return {
    audio: {
      deviceId: audio.string('deviceId', base.audio.deviceId),
      sampleRate: audio.number('sampleRate', base.audio.sampleRate),
      frameMs: audio.number('frameMs', base.audio.frameMs),
      queueCapacityMs: audio.number('queueCapacityMs', base.audio.queueCapacityMs),
    },
    vad: {
      aggressiveness: vad.oneOf('aggressiveness', AGGRESSIVENESS, base.vad.aggressiveness),
      hangoverMs: vad.number('hangoverMs', base.vad.hangoverMs),
      prerollMs: vad.number('prerollMs', base.vad.prerollMs),
      minSegmentMs: vad.number('minSegmentMs', base.vad.minSegmentMs),
    },
    partials: {
      enabled: partials.boolean('enabled', base.partials.enabled),
      windowMs: partials.number('windowMs', base.partials.windowMs),
      cadenceMs: partials.number('cadenceMs', base.partials.cadenceMs),
      minAudioMs: partials.number('minAudioMs', base.partials.minAudioMs),
    },
    engine: {
      modelId: engine.string('modelId', base.engine.modelId),
      language: engine.string('language', base.engine.language),
      task: engine.oneOf('task', TASKS, base.engine.task),
      modelDir: engine.string('modelDir', base.engine.modelDir),
    },
    output: {
      sink: output.oneOf('sink', SINKS, base.output.sink),
      fileDir: output.string('fileDir', base.output.fileDir),
      separator: output.string('separator', base.output.separator),
    },
    network: {
      enabled: network.boolean('enabled', base.network.enabled),
      port: network.number('port', base.network.port),
    },
    status: {
      intervalFrames: status.number('intervalFrames', base.status.intervalFrames),
    },
  };
}

/** `VOXLANE_*` variables as a partial settings object. */
export function envOverrides(env: NodeJS.ProcessEnv): RawSection {
  const overrides: Record<string, RawSection> = {};
  const set = (section: string, key: string, value: unknown): void => {
    overrides[section] = { ...overrides[section], [key]: value };
  };
  const asNumber = (value: string): number | string => {
    const parsed = Number(value);
    return value.trim() !== '' && Number.isFinite(parsed) ? parsed : value;
  };

  if (env.VOXLANE_DEVICE) set('audio', 'deviceId', env.VOXLANE_DEVICE);
  if (env.VOXLANE_MODEL) set('engine', 'modelId', env.VOXLANE_MODEL);
  if (env.VOXLANE_LANGUAGE) set('engine', 'language', env.VOXLANE_LANGUAGE);
  if (env.VOXLANE_MODEL_DIR) set('engine', 'modelDir', env.VOXLANE_MODEL_DIR);
  if (env.VOXLANE_SINK) set('output', 'sink', env.VOXLANE_SINK);
  if (env.VOXLANE_OUTPUT_DIR) set('output', 'fileDir', env.VOXLANE_OUTPUT_DIR);
  if (env.VOXLANE_VAD_AGGRESSIVENESS) set('vad', 'aggressiveness', asNumber(env.VOXLANE_VAD_AGGRESSIVENESS));
  if (env.VOXLANE_PORT) set('network', 'port', asNumber(env.VOXLANE_PORT));

  return overrides;
}

/** Range and consistency checks. Empty when the settings are usable. */
export function validateSettings(settings: AppSettings): string[] {
  const problems: string[] = [];
  const { audio, vad, partials, engine, network, status } = settings;

  if (audio.sampleRate !== 16000) {
    problems.push(`audio.sampleRate must be 16000 (got ${audio.sampleRate})`);
  }
  if (!FRAME_SIZES_MS.includes(audio.frameMs)) {
    problems.push(`audio.frameMs must be one of ${FRAME_SIZES_MS.join(', ')} (got ${audio.frameMs})`);
  }
  if (audio.queueCapacityMs < audio.frameMs) {
    problems.push('audio.queueCapacityMs must hold at least one frame');
  }
  if (vad.hangoverMs < audio.frameMs) {
    problems.push('vad.hangoverMs must be at least one frame');
  }
  if (vad.prerollMs < 0) {
    problems.push('vad.prerollMs must not be negative');
  }
  if (vad.minSegmentMs < 0) {
    problems.push('vad.minSegmentMs must not be negative');
  }
  if (partials.cadenceMs < 100) {
    problems.push('partials.cadenceMs must be at least 100');
  }
  if (partials.windowMs < partials.minAudioMs) {
    problems.push('partials.windowMs must be at least partials.minAudioMs');
  }
  if (engine.modelId.trim() === '') {
    problems.push('engine.modelId must not be empty');
  }
  if (engine.task === 'translate' && engine.modelId.endsWith('.en')) {
    problems.push(`engine.task "translate" needs a multilingual model (${engine.modelId} is English-only)`);
  }
  if (!Number.isInteger(network.port) || network.port < 1 || network.port > 65535) {
    problems.push(`network.port must be an integer between 1 and 65535 (got ${network.port})`);
  }
  if (!Number.isInteger(status.intervalFrames) || status.intervalFrames < 1) {
    problems.push('status.intervalFrames must be a positive integer');
  }

  return problems;
}

export interface LoadSettingsOptions {
  /** Explicit file; a missing explicit file is an error, a missing default one is not. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then the JSON file, then `VOXLANE_*` environment variables.
 * Throws `ConfigError` listing every problem found.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<AppSettings> {
  const file = options.configPath ?? defaultConfigPath();
  const problems: string[] = [];
  let settings: AppSettings = DEFAULT_SETTINGS;

  let text: string | null = null;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    if (!missing || options.configPath) {
      problems.push(`cannot read ${file}: ${describeError(err)}`);
    }
  }

  if (text !== null) {
    try {
      settings = mergeSettings(settings, JSON.parse(text), problems);
      console.log(`[Config] Loaded ${file}`);
    } catch (err) {
      problems.push(`${file} is not valid JSON: ${describeError(err)}`);
    }
  }

  settings = mergeSettings(settings, envOverrides(options.env ?? process.env), problems);
  problems.push(...validateSettings(settings));

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return settings;
}
