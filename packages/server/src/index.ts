import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import type { ServerMessage } from '@missionreplay/shared';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { MissionSession } from './mission/session.js';

const config = loadConfig();

const session = new MissionSession({
  maxRejectionsReported: config.maxRejectionsReported,
  speedBounds: config.speed,
  defaultThresholdDb: config.defaultThresholdDb,
});

const app = createApp(session, config);
const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Broadcast to all WS clients
function broadcast(data: ServerMessage) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

session.on('loaded', (mission) => broadcast({ type: 'mission_loaded', mission }));
session.on('playback', (snapshot) => broadcast({ type: 'playback', snapshot }));

// ============================================================================
// Tick source: real elapsed time drives the playback engine
// ============================================================================

let lastTick = Date.now();
const ticker = setInterval(() => {
  const now = Date.now();
  const elapsed = (now - lastTick) / 1000;
  lastTick = now;
  session.tick(elapsed);
}, config.tickIntervalMs);

// ============================================================================
// WebSocket handling
// ============================================================================

wss.on('connection', (ws: WebSocket) => {
  console.log('⚡ Client connected');

  // Send initial state
  const mission = session.current();
  if (mission) {
    ws.send(JSON.stringify({ type: 'mission_loaded', mission: mission.summary } satisfies ServerMessage));
    ws.send(JSON.stringify({ type: 'playback', snapshot: mission.engine.snapshot() } satisfies ServerMessage));
  }

  ws.on('close', () => {
    console.log('⚡ Client disconnected');
  });
});

function shutdown() {
  clearInterval(ticker);
  wss.close();
  server.close(() => process.exit(0));
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

server.listen(config.port, '0.0.0.0', () => {
  console.log(`
  🛰️ ╔═══════════════════════════════════════╗
  🛰️ ║       M I S S I O N   R E P L A Y      ║
  🛰️ ╠═══════════════════════════════════════╣
  🛰️ ║  HTTP:  http://0.0.0.0:${config.port}            ║
  🛰️ ║  WS:    ws://0.0.0.0:${config.port}/ws           ║
  🛰️ ╚═══════════════════════════════════════╝
  `);

  if (config.missionFile) {
    session.loadFile(config.missionFile).catch((err: unknown) => {
      console.error('🛰️ Startup mission load failed:', err);
    });
  }
});
