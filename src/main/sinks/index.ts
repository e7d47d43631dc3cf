import { OutputSettings } from '../../shared/types/settings';
import { ClipboardSink } from './ClipboardSink';
import { FileSink } from './FileSink';
import { PasteSink } from './PasteSink';
import { Sink } from './Sink';
import { StdoutSink } from './StdoutSink';

export type { Sink } from './Sink';
export { attachSink, isDeliverable } from './Sink';
export { ClipboardSink } from './ClipboardSink';
export { FileSink } from './FileSink';
export { PasteSink } from './PasteSink';
export { StdoutSink } from './StdoutSink';

export function createSink(output: OutputSettings): Sink {
  switch (output.sink) {
    case 'clipboard':
      return new ClipboardSink();
    case 'paste':
      return new PasteSink();
    case 'file':
      return new FileSink(output.fileDir, output.separator);
    case 'stdout':
      return new StdoutSink();
  }
}
