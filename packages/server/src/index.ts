import express from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { createServer } from 'http';
import * as fs from 'fs';
import type { AlertEvent, CasterEndpoint, MonitorServerMessage, SessionSnapshot, StationInput } from '@castermon/shared';
import { loadConfig, type MonitorConfig } from './config.js';
import { CasterMonitor } from './monitor.js';
import { openDatabase } from './services/database.js';
import { StationStore } from './stations/store.js';
import { validateCasterEndpoint, validateStationInput } from './stations/validation.js';
import { AlertLog } from './alerts/history.js';
import { fetchSourcetable, mountpointToStation } from './ntrip/sourcetable.js';
import type { TerminationEvent } from './ntrip/supervisor.js';

let config: MonitorConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error(`⚡ Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const ALERT_RETENTION_MS = 30 * 24 * 3600_000;

const app = express();
app.use(cors());
app.use(express.json());

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

// Services
const db = openDatabase(config.databaseFile);
const stationStore = new StationStore(db);
const alertLog = new AlertLog(db);
const monitor = new CasterMonitor({
  policy: config.reconnect,
  timings: config.timings,
  aggregator: {
    rateWindowMs: config.rateWindowMs,
    satelliteWindowMs: config.satelliteWindowMs,
    counterPolicy: config.counterPolicy,
  },
  thresholds: config.alerts,
  tickIntervalMs: config.tickIntervalMs,
  shutdownTimeoutMs: config.shutdownTimeoutMs,
});

if (config.castersFile) {
  if (fs.existsSync(config.castersFile)) {
    const imported = stationStore.importCastersFile(config.castersFile);
    console.log(`🗂️ Imported ${imported} station(s) from ${config.castersFile}`);
  } else {
    console.warn(`🗂️ Casters file not found: ${config.castersFile}`);
  }
}

monitor.attachStore(stationStore);
monitor.loadStations(stationStore.list());
monitor.startTicking();

// Broadcast to all WS clients
function broadcast(data: MonitorServerMessage) {
  const msg = JSON.stringify(data);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) client.send(msg);
  });
}

monitor.on('phase', (session: SessionSnapshot) => {
  broadcast({ type: 'phase', session });
});

monitor.on('terminated', ({ termination, decision }: TerminationEvent) => {
  if (decision.action === 'give_up') {
    console.warn(`📡 [${termination.stationId}] offline: ${termination.reason} (${decision.reason})`);
  }
});

monitor.on('alert', (alert: AlertEvent) => {
  alertLog.record(alert);
  broadcast({ type: 'alert', alert });
});

// Full station list every few seconds
setInterval(() => {
  broadcast({ type: 'stations', stations: monitor.getStationViews() });
}, 5000);

// Alert history cleanup
setInterval(() => {
  const pruned = alertLog.prune(Date.now() - ALERT_RETENTION_MS);
  if (pruned > 0) console.log(`🚨 Pruned ${pruned} old alert event(s)`);
}, 3600_000);

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

// ============================================================================
// REST endpoints
// ============================================================================

app.get('/api/health', (_req, res) => {
  const sessions = monitor.supervisor.getSnapshots();
  res.json({
    name: 'CasterMon',
    version: '0.1.0',
    uptime: process.uptime(),
    stations: monitor.supervisor.getStationIds().length,
    connected: sessions.filter((s) => s.phase === 'connected' || s.phase === 'idle_warning').length,
  });
});

app.get('/api/stations', (_req, res) => {
  res.json(monitor.getStationViews());
});

app.get('/api/stations/:id', (req, res) => {
  const view = monitor.getStationView(req.params.id);
  if (!view) return res.status(404).json({ error: 'Station not found' });
  res.json(view);
});

app.post('/api/stations', (req, res) => {
  try {
    const station = stationStore.add(validateStationInput(req.body));
    res.status(201).json(monitor.getStationView(station.id));
  } catch (err) {
    res.status(400).json({ error: errorMessage(err) });
  }
});

app.put('/api/stations/:id', (req, res) => {
  let input: StationInput;
  try {
    input = validateStationInput(req.body);
  } catch (err) {
    return res.status(400).json({ error: errorMessage(err) });
  }
  try {
    const station = stationStore.update(req.params.id, input);
    if (!station) return res.status(404).json({ error: 'Station not found' });
    res.json(monitor.getStationView(station.id));
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

app.delete('/api/stations/:id', (req, res) => {
  if (!stationStore.remove(req.params.id)) return res.status(404).json({ error: 'Station not found' });
  res.json({ ok: true });
});

app.post('/api/stations/reconnect-all', (_req, res) => {
  res.json({ started: monitor.reconnectAll() });
});

app.post('/api/stations/:id/start', (req, res) => {
  if (!monitor.supervisor.has(req.params.id)) return res.status(404).json({ error: 'Station not found' });
  const started = monitor.start(req.params.id);
  res.json({ started, session: monitor.supervisor.getSnapshot(req.params.id) });
});

app.post('/api/stations/:id/stop', async (req, res) => {
  if (!monitor.supervisor.has(req.params.id)) return res.status(404).json({ error: 'Station not found' });
  try {
    await monitor.stop(req.params.id);
    res.json({ session: monitor.supervisor.getSnapshot(req.params.id) });
  } catch (err) {
    res.status(500).json({ error: errorMessage(err) });
  }
});

app.get('/api/stations/:id/throughput', (req, res) => {
  const consumer = typeof req.query.consumer === 'string' && req.query.consumer ? req.query.consumer : 'api';
  const reading = monitor.readThroughput(consumer, req.params.id);
  if (!reading) return res.status(404).json({ error: 'Station not found' });
  res.json(reading);
});

app.get('/api/alerts', (req, res) => {
  const stationId = typeof req.query.station === 'string' ? req.query.station : undefined;
  const limit = parseInt(String(req.query.limit ?? '100'), 10);
  res.json(alertLog.list({ stationId, limit: Number.isFinite(limit) && limit > 0 ? Math.min(limit, 1000) : 100 }));
});

app.post('/api/sourcetable', async (req, res) => {
  let endpoint: CasterEndpoint;
  try {
    endpoint = validateCasterEndpoint(req.body);
  } catch (err) {
    return res.status(400).json({ error: errorMessage(err) });
  }
  try {
    res.json(await fetchSourcetable(endpoint));
  } catch (err) {
    res.status(502).json({ error: errorMessage(err) });
  }
});

app.post('/api/sourcetable/import', async (req, res) => {
  let endpoint: CasterEndpoint;
  try {
    endpoint = validateCasterEndpoint(req.body);
  } catch (err) {
    return res.status(400).json({ error: errorMessage(err) });
  }
  const wanted: unknown = req.body?.mountpoints;
  const filter = Array.isArray(wanted) ? new Set(wanted.filter((m): m is string => typeof m === 'string')) : null;

  try {
    const mountpoints = await fetchSourcetable(endpoint);
    const added: string[] = [];
    for (const descriptor of mountpoints) {
      if (filter && !filter.has(descriptor.mountpoint)) continue;
      try {
        added.push(stationStore.add(mountpointToStation(endpoint, descriptor)).id);
      } catch (err) {
        console.warn(`🗂️ Skipping ${descriptor.mountpoint}: ${errorMessage(err)}`);
      }
    }
    res.json({ added });
  } catch (err) {
    res.status(502).json({ error: errorMessage(err) });
  }
});

// ============================================================================
// WebSocket
// ============================================================================

wss.on('connection', (ws: WebSocket) => {
  console.log('⚡ Client connected');
  const initial: MonitorServerMessage = { type: 'stations', stations: monitor.getStationViews() };
  ws.send(JSON.stringify(initial));

  ws.on('message', (data) => {
    let msg: unknown;
    try {
      msg = JSON.parse(data.toString());
    } catch {
      sendError(ws, 'Invalid JSON');
      return;
    }
    handleCommand(ws, msg);
  });

  ws.on('close', () => {
    console.log('⚡ Client disconnected');
  });
});

function sendError(ws: WebSocket, message: string) {
  const reply: MonitorServerMessage = { type: 'error', message };
  ws.send(JSON.stringify(reply));
}

function handleCommand(ws: WebSocket, msg: unknown) {
  if (typeof msg !== 'object' || msg === null || !('type' in msg)) {
    sendError(ws, 'Command must be an object with a type');
    return;
  }
  const stationId = 'stationId' in msg && typeof msg.stationId === 'string' ? msg.stationId : undefined;

  switch (msg.type) {
    case 'start':
      if (!stationId || !monitor.supervisor.has(stationId)) return sendError(ws, `Unknown station: ${stationId}`);
      monitor.start(stationId);
      break;
    case 'stop':
      if (!stationId || !monitor.supervisor.has(stationId)) return sendError(ws, `Unknown station: ${stationId}`);
      monitor.stop(stationId).catch((err) => sendError(ws, errorMessage(err)));
      break;
    case 'reconnect_all':
      monitor.reconnectAll();
      break;
    default:
      sendError(ws, `Unknown command: ${String(msg.type)}`);
  }
}

// ============================================================================
// Lifecycle
// ============================================================================

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`⚡ ${signal} received, closing caster sessions...`);
  try {
    await monitor.shutdown();
  } finally {
    wss.close();
    server.close();
    db.close();
    process.exit(0);
  }
}

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

server.listen(config.port, '0.0.0.0', () => {
  console.log(`
  ⚡ ╔═══════════════════════════════════════╗
  ⚡ ║          C A S T E R M O N            ║
  ⚡ ║     NTRIP Caster Monitor v0.1         ║
  ⚡ ╠═══════════════════════════════════════╣
  ⚡ ║  HTTP:  http://0.0.0.0:${config.port}            ║
  ⚡ ║  WS:    ws://0.0.0.0:${config.port}/ws           ║
  ⚡ ║  Stations: ${String(monitor.supervisor.getStationIds().length).padEnd(27)}║
  ⚡ ╚═══════════════════════════════════════╝
  `);
});
