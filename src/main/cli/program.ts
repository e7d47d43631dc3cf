import { Command } from 'commander';
import { AudioCaptureManager } from '../audio/AudioCaptureManager';
import { DEFAULT_SETTINGS } from '../../shared/types/settings';
import { BenchOptions, benchCommand } from './bench';
import { RunOptions } from './options';
import { runCommand } from './run';

export function buildProgram(version: string): Command {
  const program = new Command();

  program
    .name('voxlane')
    .description('Offline push-to-talk dictation with live partial transcripts')
    .version(version);

  program
    .command('run', { isDefault: true })
    .description('Start a dictation session (Enter toggles recording, q quits)')
    .option('-c, --config <file>', 'Settings file (JSON)')
    .option('-s, --sink <sink>', 'Where finals go: stdout, clipboard, paste or file')
    .option('-m, --model <model>', 'Whisper model, e.g. base.en or small')
    .option('-l, --language <code>', 'Spoken language')
    .option('-d, --device <device>', 'Input device')
    .option('--no-partials', 'Disable live partial transcripts')
    .option('--serve', 'Serve a read-only viewer on the local network')
    .option('-p, --port <port>', 'Viewer port (implies --serve)')
    .option('-t, --transcript <file>', 'Write a timestamped transcript on exit')
    .action(async (options: RunOptions) => {
      await runCommand(options);
    });

  program
    .command('devices')
    .description('List audio input devices')
    .action(async () => {
      const capture = new AudioCaptureManager(DEFAULT_SETTINGS.audio);
      for (const device of await capture.listDevices()) {
        console.log(`${device.deviceId}\t${device.label}`);
      }
    });

  program
    .command('bench')
    .description('Record a few seconds and report transcription speed')
    .option('-n, --seconds <seconds>', 'How long to record', '5')
    .option('-c, --config <file>', 'Settings file (JSON)')
    .option('-m, --model <model>', 'Whisper model, e.g. base.en or small')
    .option('-l, --language <code>', 'Spoken language')
    .option('-d, --device <device>', 'Input device')
    .action(async (options: BenchOptions) => {
      await benchCommand(options);
    });

  return program;
}
