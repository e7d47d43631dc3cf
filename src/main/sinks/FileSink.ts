import { appendFile, mkdir } from 'fs/promises';
import { homedir } from 'os';
import path from 'path';
import { SinkError, describeError } from '../errors';
import { Sink } from './Sink';

export function expandHome(dir: string): string {
  if (dir === '~') return homedir();
  if (dir.startsWith('~/')) return path.join(homedir(), dir.slice(2));
  return dir;
}

/** `dictation-YYYY-MM-DD.txt`, one file per local day. */
export function dailyFileName(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `dictation-${yyyy}-${mm}-${dd}.txt`;
}

/**
 * Appends each final to a daily text file followed by the separator.
 */
export class FileSink implements Sink {
  readonly name = 'file';
  private readonly dir: string;
  private dirReady = false;

  constructor(
    dir: string,
    private readonly separator = '\n',
    private readonly now: () => Date = () => new Date(),
  ) {
    this.dir = expandHome(dir);
  }

  get currentFile(): string {
    return path.join(this.dir, dailyFileName(this.now()));
  }

  async handleFinal(text: string): Promise<void> {
    const file = this.currentFile;
    try {
      if (!this.dirReady) {
        await mkdir(this.dir, { recursive: true });
        this.dirReady = true;
      }
      await appendFile(file, text + this.separator, 'utf8');
    } catch (err) {
      throw new SinkError(`Could not append to ${file}: ${describeError(err)}`, { cause: err });
    }
  }
}
