import { mergeSettings, validateSettings } from '../config/loadSettings';
import { ConfigError } from '../errors';
import { AppSettings } from '../../shared/types/settings';

export interface RunOptions {
  config?: string;
  sink?: string;
  model?: string;
  language?: string;
  device?: string;
  /** `--no-partials` sets this to false. */
  partials?: boolean;
  serve?: boolean;
  port?: string;
  transcript?: string;
}

/** Command-line flags win over file and environment settings. */
export function applyRunOptions(settings: AppSettings, options: RunOptions): AppSettings {
  const overlay: Record<string, Record<string, unknown>> = {
    audio: {},
    engine: {},
    output: {},
    partials: {},
    network: {},
  };

  if (options.device !== undefined) overlay.audio.deviceId = options.device;
  if (options.model !== undefined) overlay.engine.modelId = options.model;
  if (options.language !== undefined) overlay.engine.language = options.language;
  if (options.sink !== undefined) overlay.output.sink = options.sink;
  if (options.partials === false) overlay.partials.enabled = false;
  if (options.serve) overlay.network.enabled = true;
  if (options.port !== undefined) {
    overlay.network.port = Number(options.port);
    overlay.network.enabled = true;
  }

  const problems: string[] = [];
  const merged = mergeSettings(settings, overlay, problems);
  problems.push(...validateSettings(merged));
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return merged;
}
