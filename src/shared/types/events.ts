import { SegmenterState } from './segment';

export type ErrorKind = 'capture' | 'queue-overflow' | 'classifier' | 'engine' | 'sink';
export type DecodeStage = 'partial' | 'final';

export interface DecodeFailure {
  kind: ErrorKind;
  message: string;
}

export interface PartialEventBody {
  type: 'partial';
  text: string;
  /** Upper bound on how much the preview should be trusted. */
  confidence: number;
  windowMs: number;
}

export interface FinalEventBody {
  type: 'final';
  segmentId: string;
  text: string;
  latencyMs: number;
  audioMs: number;
  error?: DecodeFailure;
}

export interface StatusEventBody {
  type: 'status';
  levelDbfs: number;
  vadActive: boolean;
  state: SegmenterState;
  droppedFrames: number;
}

export interface ErrorEventBody {
  type: 'error';
  kind: ErrorKind;
  message: string;
  fatal: boolean;
  stage?: DecodeStage;
}

export type TranscriptionEventBody =
  | PartialEventBody
  | FinalEventBody
  | StatusEventBody
  | ErrorEventBody;

export type TranscriptionEventType = TranscriptionEventBody['type'];

export interface EventEnvelope {
  seq: number;
  timestamp: number;
}

export type TranscriptionEvent = TranscriptionEventBody & EventEnvelope;
export type PartialEvent = PartialEventBody & EventEnvelope;
export type FinalEvent = FinalEventBody & EventEnvelope;
export type StatusEvent = StatusEventBody & EventEnvelope;
export type ErrorEvent = ErrorEventBody & EventEnvelope;
