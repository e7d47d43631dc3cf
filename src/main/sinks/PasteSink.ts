import { ClipboardSink, ToolCommand, ToolRunner, clipboardCommand, runTool } from './ClipboardSink';
import { Sink } from './Sink';

/** Synthesized paste shortcut for the focused window. */
export function pasteKeystrokeCommand(platform: NodeJS.Platform = process.platform): ToolCommand {
  if (platform === 'darwin') {
    return {
      file: 'osascript',
      args: ['-e', 'tell application "System Events" to keystroke "v" using command down'],
    };
  }
  if (platform === 'win32') {
    return {
      file: 'powershell',
      args: ['-NoProfile', '-Command', "(New-Object -ComObject WScript.Shell).SendKeys('^v')"],
    };
  }
  return { file: 'xdotool', args: ['key', '--clearmodifiers', 'ctrl+v'] };
}

/**
 * Types each final into whatever has focus: the text goes on the clipboard,
 * then a paste shortcut is sent. The clipboard keeps the last final.
 */
export class PasteSink implements Sink {
  readonly name = 'paste';
  private readonly clipboard: ClipboardSink;

  constructor(
    copy: ToolCommand = clipboardCommand(),
    private readonly keystroke: ToolCommand = pasteKeystrokeCommand(),
    private readonly run: ToolRunner = runTool,
  ) {
    this.clipboard = new ClipboardSink(copy, run);
  }

  async handleFinal(text: string): Promise<void> {
    await this.clipboard.handleFinal(text);
    await this.run(this.keystroke);
  }
}
