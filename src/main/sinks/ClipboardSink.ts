import { execFile } from 'child_process';
import { SinkError, describeError } from '../errors';
import { Sink } from './Sink';

export interface ToolCommand {
  file: string;
  args: string[];
}

/** Runs a helper program, feeding `input` on stdin when given. */
export type ToolRunner = (command: ToolCommand, input?: string) => Promise<void>;

export const runTool: ToolRunner = ({ file, args }, input) =>
  new Promise((resolve, reject) => {
    const child = execFile(file, args, (err) => {
      if (err) {
        reject(new SinkError(`${file} failed: ${describeError(err)}`, { cause: err }));
      } else {
        resolve();
      }
    });
    child.stdin?.end(input ?? '');
  });

export function clipboardCommand(platform: NodeJS.Platform = process.platform): ToolCommand {
  if (platform === 'darwin') return { file: 'pbcopy', args: [] };
  if (platform === 'win32') return { file: 'clip', args: [] };
  return { file: 'xclip', args: ['-selection', 'clipboard'] };
}

/**
 * Replaces the clipboard with each final. Pasting is left to the user.
 */
export class ClipboardSink implements Sink {
  readonly name = 'clipboard';

  constructor(
    private readonly command: ToolCommand = clipboardCommand(),
    private readonly run: ToolRunner = runTool,
  ) {}

  handleFinal(text: string): Promise<void> {
    return this.run(this.command, text);
  }
}
