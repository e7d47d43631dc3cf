import { TranscriptionEvent } from './events';
import { TranscriptSegment } from './transcript';

export type SessionStatus = 'idle' | 'recording' | 'stopping';

export interface AudioDevice {
  deviceId: string;
  label: string;
  kind: 'audioinput';
}

export interface NetworkStatus {
  running: boolean;
  port: number;
  url: string;
  connectedClients: number;
}

export type ViewerMessage =
  | { type: 'welcome'; payload: { recentSegments: TranscriptSegment[] } }
  | { type: 'event'; payload: TranscriptionEvent };
