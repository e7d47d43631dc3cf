import { Writable } from 'stream';
import { Sink } from './Sink';

export class StdoutSink implements Sink {
  readonly name = 'stdout';

  constructor(private readonly out: Writable = process.stdout) {}

  handleFinal(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.out.write(`${text}\n`, (err) => (err ? reject(err) : resolve()));
    });
  }
}
