declare module 'node-record-lpcm16' {
  import { Readable } from 'stream';
  import { ChildProcess } from 'child_process';

  interface RecordingOptions {
    sampleRate?: number;
    channels?: number;
    threshold?: number;
    recorder?: 'sox' | 'rec' | 'arecord';
    endOnSilence?: boolean;
    audioType?: string;
    device?: string;
  }

  interface Recording {
    stream(): Readable;
    stop(): void;
    process: ChildProcess;
  }

  function record(options?: RecordingOptions): Recording;

  export { record, Recording, RecordingOptions };
}
