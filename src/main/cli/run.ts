import { writeFile } from 'fs/promises';
import { createInterface } from 'readline';
import { AudioCaptureManager } from '../audio/AudioCaptureManager';
import { loadSettings } from '../config/loadSettings';
import { describeError } from '../errors';
import { DictationPipeline } from '../pipeline/DictationPipeline';
import { NetworkServer } from '../server/NetworkServer';
import { attachSink, createSink } from '../sinks';
import { WhisperEngine, defaultModelDir } from '../stt/WhisperEngine';
import { TranscriptBuffer } from '../transcript/TranscriptBuffer';
import { LiveLine, levelMeter } from './LiveLine';
import { RunOptions, applyRunOptions } from './options';

/**
 * Live dictation session. Enter toggles recording, `q` or Ctrl-C quits.
 */
export async function runCommand(options: RunOptions): Promise<void> {
  const settings = applyRunOptions(await loadSettings({ configPath: options.config }), options);
  const { engine: engineSettings } = settings;

  const engine = new WhisperEngine(
    engineSettings.modelId,
    engineSettings.modelDir || defaultModelDir(engineSettings.modelId),
  );
  engine.on('status', (message: string) => console.log(`[Whisper] ${message}`));
  await engine.init();

  const pipeline = new DictationPipeline(settings, {
    source: new AudioCaptureManager(settings.audio),
    engine,
  });
  const { bus } = pipeline;
  const transcript = new TranscriptBuffer();
  const liveLine = new LiveLine();

  // The live line is cleared before a final so the sink's output starts on a clean line.
  bus.subscribeTo('final', (event) => {
    liveLine.clear();
    transcript.addFinal(event);
  }, { name: 'transcript' });
  attachSink(bus, createSink(settings.output));

  bus.subscribeTo('partial', (event) => liveLine.show(`… ${event.text}`), {
    mode: 'best-effort',
    maxQueue: 1,
    name: 'live-partial',
  });
  if (!settings.partials.enabled) {
    bus.subscribeTo('status', (event) => {
      liveLine.show(`${levelMeter(event.levelDbfs)} ${event.vadActive ? 'speaking' : 'listening'}`);
    }, { mode: 'best-effort', maxQueue: 1, name: 'live-status' });
  }
  bus.subscribeTo('error', (event) => {
    liveLine.clear();
    console.error(`[${event.fatal ? 'Fatal' : 'Warn'}] ${event.kind}: ${event.message}`);
  }, { name: 'errors' });

  let server: NetworkServer | null = null;
  if (settings.network.enabled) {
    server = new NetworkServer(bus, transcript, settings.network.port);
    const status = await server.start();
    console.log(`[Network] Viewer: ${status.url}`);
    console.log(await server.getQRCode());
  }

  pipeline.on('started', () => console.error('● Recording (Enter to pause, q to quit)'));
  pipeline.on('stopped', () => console.error('○ Paused (Enter to resume, q to quit)'));

  const rl = createInterface({ input: process.stdin });
  let quitting: Promise<void> | null = null;

  const quit = (): Promise<void> => {
    quitting ??= (async () => {
      rl.close();
      await pipeline.stop();
      await bus.settled();
      liveLine.clear();
      server?.stop();
      bus.clear();
      engine.destroy();

      if (options.transcript) {
        await writeFile(options.transcript, transcript.exportTimestamped() + '\n', 'utf8');
        console.error(`Transcript written to ${options.transcript}`);
      }
    })();
    return quitting;
  };

  const done = new Promise<void>((resolve, reject) => {
    const finish = (): void => {
      quit().then(resolve, reject);
    };

    rl.on('line', (line) => {
      if (line.trim().toLowerCase() === 'q') {
        finish();
        return;
      }
      pipeline.toggle().catch((err: unknown) => {
        console.error('[Pipeline] Toggle failed:', describeError(err));
      });
    });
    rl.on('close', finish);
    process.once('SIGINT', finish);
  });

  await pipeline.start();
  await done;
}
