import express from 'express';
import { createServer, Server as HTTPServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { networkInterfaces } from 'os';
import QRCode from 'qrcode';
import { TranscriptionEvent, TranscriptionEventType } from '../../shared/types/events';
import { NetworkStatus, ViewerMessage } from '../../shared/types/network';
import { TranscriptBuffer } from '../transcript/TranscriptBuffer';
import { TranscriptEventBus, Unsubscribe } from '../transcript/TranscriptEventBus';

/** Event types viewers receive. Errors stay local. */
export const VIEWER_EVENT_TYPES: readonly TranscriptionEventType[] = ['partial', 'final', 'status'];

/** Finals replayed to a viewer that joins mid-session. */
export const WELCOME_SEGMENTS = 50;

export function welcomeMessage(transcript: TranscriptBuffer): ViewerMessage {
  return { type: 'welcome', payload: { recentSegments: transcript.getRecent(WELCOME_SEGMENTS) } };
}

export function getLocalIP(): string {
  const interfaces = networkInterfaces();
  for (const name of Object.keys(interfaces)) {
    for (const iface of interfaces[name] || []) {
      if (iface.family === 'IPv4' && !iface.internal) {
        return iface.address;
      }
    }
  }
  return '127.0.0.1';
}

/**
 * Optional read-only viewer on the local network. Streams transcription
 * events over WebSocket; audio never leaves the machine.
 */
export class NetworkServer {
  private httpServer: HTTPServer | null = null;
  private wss: WebSocketServer | null = null;
  private unsubscribe: Unsubscribe | null = null;
  private _isRunning = false;

  constructor(
    private readonly bus: TranscriptEventBus,
    private readonly transcript: TranscriptBuffer,
    private readonly port = 8080,
  ) {}

  get isRunning(): boolean {
    return this._isRunning;
  }

  get connectedClients(): number {
    return this.wss ? this.wss.clients.size : 0;
  }

  getStatus(): NetworkStatus {
    return {
      running: this._isRunning,
      port: this.port,
      url: this._isRunning ? `http://${getLocalIP()}:${this.port}` : '',
      connectedClients: this.connectedClients,
    };
  }

  async start(): Promise<NetworkStatus> {
    if (this._isRunning) return this.getStatus();

    const app = express();
    const httpServer = createServer(app);
    const wss = new WebSocketServer({ server: httpServer });
    this.httpServer = httpServer;
    this.wss = wss;

    app.use((_req, res, next) => {
      res.set(
        'Content-Security-Policy',
        "default-src 'self'; script-src 'unsafe-inline'; style-src 'unsafe-inline'; connect-src 'self' ws: wss:"
      );
      next();
    });

    app.get('/', (_req, res) => {
      res.type('html').send(VIEWER_HTML);
    });

    app.get('/api/status', (_req, res) => {
      res.json({
        app: 'voxlane',
        clients: wss.clients.size,
        lastSeq: this.bus.lastSeq,
        segments: this.transcript.length,
      });
    });

    wss.on('connection', (ws: WebSocket) => {
      console.log(`[Network] Viewer connected (${wss.clients.size} total)`);
      ws.send(JSON.stringify(welcomeMessage(this.transcript)));

      ws.on('close', () => {
        console.log(`[Network] Viewer disconnected (${wss.clients.size} total)`);
      });
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          console.error(`[Network] Port ${this.port} already in use`);
        }
        reject(err);
      });
      httpServer.listen(this.port, () => resolve());
    });

    this.unsubscribe = this.bus.subscribe((event) => this.broadcastEvent(event), {
      types: [...VIEWER_EVENT_TYPES],
      mode: 'best-effort',
      maxQueue: 64,
      name: 'network',
    });

    this._isRunning = true;
    const status = this.getStatus();
    console.log(`[Network] Server running at ${status.url}`);
    return status;
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;

    if (this.wss) {
      this.wss.clients.forEach((client) => client.close());
      this.wss.close();
      this.wss = null;
    }

    if (this.httpServer) {
      this.httpServer.close();
      this.httpServer = null;
    }

    if (this._isRunning) {
      this._isRunning = false;
      console.log('[Network] Server stopped');
    }
  }

  async getQRCode(): Promise<string> {
    return QRCode.toString(`http://${getLocalIP()}:${this.port}`, { type: 'terminal' });
  }

  private broadcastEvent(event: TranscriptionEvent): void {
    this.broadcast({ type: 'event', payload: event });
  }

  private broadcast(message: ViewerMessage): void {
    if (!this.wss) return;
    const data = JSON.stringify(message);
    this.wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    });
  }
}

const VIEWER_HTML = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Dictation Viewer</title>
  <style>
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: Arial, sans-serif; font-size: 28px; line-height: 1.5; height: 100vh; overflow: hidden; }
    #container { height: 100vh; display: flex; flex-direction: column; justify-content: flex-end; padding: 2rem; overflow-y: auto; }
    .line { margin-bottom: 0.5rem; }
    #partial { opacity: 0.45; font-style: italic; min-height: 1.5em; }
    #status { position: fixed; top: 0.5rem; right: 0.5rem; padding: 0.25rem 0.5rem; border-radius: 0.25rem; font-size: 0.7rem; color: white; }
    #level { position: fixed; top: 0; left: 0; height: 4px; background: #22c55e; width: 0; transition: width 0.1s; }
    .status-connected { background: #22c55e; }
    .status-disconnected { background: #ef4444; }
    .status-connecting { background: #eab308; }
  </style>
</head>
<body>
  <div id="level"></div>
  <div id="status" class="status-connecting">Connecting...</div>
  <div id="container"><div id="lines"></div><p id="partial"></p></div>
  <script>
    const linesEl = document.getElementById('lines');
    const partialEl = document.getElementById('partial');
    const statusEl = document.getElementById('status');
    const levelEl = document.getElementById('level');
    const MAX_LINES = 30;

    function addLine(text) {
      if (!text) return;
      const div = document.createElement('div');
      div.className = 'line';
      div.textContent = text;
      linesEl.appendChild(div);
      while (linesEl.children.length > MAX_LINES) linesEl.removeChild(linesEl.firstChild);
    }

    function onEvent(e) {
      if (e.type === 'partial') partialEl.textContent = e.text;
      if (e.type === 'final') { partialEl.textContent = ''; addLine(e.text); }
      if (e.type === 'status') levelEl.style.width = Math.max(0, Math.min(100, (e.levelDbfs + 60) * 100 / 60)) + '%';
    }

    function connect() {
      const ws = new WebSocket((location.protocol === 'https:' ? 'wss:' : 'ws:') + '//' + location.host);
      ws.onopen = () => { statusEl.textContent = 'Connected'; statusEl.className = 'status-connected'; };
      ws.onclose = () => {
        statusEl.textContent = 'Disconnected';
        statusEl.className = 'status-disconnected';
        setTimeout(connect, 2000);
      };
      ws.onerror = () => ws.close();
      ws.onmessage = (msg) => {
        const data = JSON.parse(msg.data);
        if (data.type === 'welcome') { linesEl.textContent = ''; data.payload.recentSegments.forEach((s) => addLine(s.text)); }
        if (data.type === 'event') onEvent(data.payload);
      };
    }

    connect();
  </script>
</body>
</html>`;
