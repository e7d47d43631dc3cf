import { TranscriptBuffer } from '../../transcript/TranscriptBuffer';
import { TranscriptEventBus } from '../../transcript/TranscriptEventBus';
import { NetworkServer, VIEWER_EVENT_TYPES, WELCOME_SEGMENTS, welcomeMessage } from '../NetworkServer';

describe('NetworkServer', () => {
  test('reports not running before start', () => {
    const server = new NetworkServer(new TranscriptEventBus(), new TranscriptBuffer(), 8123);

    expect(server.getStatus()).toEqual({ running: false, port: 8123, url: '', connectedClients: 0 });
  });

  test('viewers never receive error events', () => {
    expect(VIEWER_EVENT_TYPES).toEqual(['partial', 'final', 'status']);
  });

  test('welcome replays the most recent finals', () => {
    const transcript = new TranscriptBuffer();
    for (let i = 0; i < WELCOME_SEGMENTS + 5; i++) {
      transcript.add({ id: `seg-${i}`, text: `line ${i}`, timestamp: i, latencyMs: 0, failed: false });
    }

    const message = welcomeMessage(transcript);
    if (message.type !== 'welcome') throw new Error('expected a welcome message');

    expect(message.payload.recentSegments).toHaveLength(WELCOME_SEGMENTS);
    expect(message.payload.recentSegments[0].id).toBe('seg-5');
  });

  test('stop before start is a no-op', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const server = new NetworkServer(new TranscriptEventBus(), new TranscriptBuffer());

    server.stop();
    expect(log).not.toHaveBeenCalled();
    expect(server.isRunning).toBe(false);
    log.mockRestore();
  });
});
