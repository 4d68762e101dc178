import express from 'express';
import http from 'http';
import cors from 'cors';
import { Server } from 'socket.io';
import { stateFor } from './net/dto';
import { RoomManager } from './rooms/RoomManager';
import { toSeat } from './game/Player';

const app = express();
app.use(cors());
app.get('/health', (_req, res) => res.json({ ok: true }));

const server = http.createServer(app);
const io = new Server(server, { cors: { origin: true, credentials: true } });

// 30 days idle retention unless overridden
const TTL_MS = Number(process.env.ROOM_TTL_MS || 30 * 24 * 60 * 60 * 1000);
const rooms = new RoomManager(TTL_MS);

setInterval(() => {
  const n = rooms.cleanup();
  if (n > 0) console.log(`[riichi-table] dropped ${n} idle room(s)`);
}, 6 * 60 * 60 * 1000).unref();

type Handshake = { roomId: string; clientId: string; rules: string | null; seed: number | undefined };

function field(obj: unknown, key: string): unknown {
  if (typeof obj !== 'object' || obj === null) return undefined;
  return Object.prototype.hasOwnProperty.call(obj, key) ? Reflect.get(obj, key) : undefined;
}

function optionalSeed(v: unknown): number | undefined {
  const n = typeof v === 'number' ? v : Number(String(v ?? ''));
  return v !== undefined && v !== '' && Number.isInteger(n) ? n : undefined;
}

function readHandshake(auth: unknown): Handshake {
  const rules = field(auth, 'rules');
  return {
    roomId: String(field(auth, 'roomId') ?? '').trim(),
    clientId: String(field(auth, 'clientId') ?? '').trim(),
    rules: typeof rules === 'string' ? rules : null,
    seed: optionalSeed(field(auth, 'seed')),
  };
}

function errorTo(socketId: string, message: string) {
  io.to(socketId).emit('errorMsg', { message });
}

function broadcastRoom(roomId: string) {
  const table = rooms.get(roomId);
  for (const s of io.sockets.sockets.values()) {
    const hs = readHandshake(s.handshake.auth);
    if (hs.roomId !== roomId) continue;
    s.emit('state', stateFor(table, hs.clientId, s.connected));
  }
}

io.on('connection', (socket) => {
  const { roomId, clientId, rules, seed } = readHandshake(socket.handshake.auth);

  if (!roomId || !clientId) {
    errorTo(socket.id, 'missing roomId/clientId');
    socket.disconnect(true);
    return;
  }

  const table = rooms.get(roomId, rules);
  const { role } = table.join(clientId);
  if (role === 'controller' && !table.started) table.reset(clientId, seed);
  console.log(`[riichi-table] ${clientId} joined ${roomId} as ${role}`);

  broadcastRoom(roomId);

  const reject = (message: string) => {
    console.warn(`[riichi-table] ${roomId}/${clientId}: ${message}`);
    errorTo(socket.id, message);
  };

  socket.on('reset', (payload: unknown) => {
    const r = table.reset(clientId, optionalSeed(field(payload, 'seed')));
    if (!r.ok) reject(r.message);
    broadcastRoom(roomId);
  });

  socket.on('apply', (payload: unknown) => {
    const seat = field(payload, 'seat');
    const index = field(payload, 'index');
    if (typeof seat !== 'number' || !Number.isInteger(seat) || seat < 0 || seat > 3) {
      reject('seat must be 0..3');
      return;
    }
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      reject('index must be an integer');
      return;
    }
    try {
      const r = table.applyByIndex(clientId, toSeat(seat), index);
      if (!r.ok) reject(r.message);
    } catch (e) {
      reject(e instanceof Error ? e.message : String(e));
    }
    broadcastRoom(roomId);
  });

  socket.on('nextHand', () => {
    const r = table.nextHand(clientId);
    if (!r.ok) reject(r.message);
    broadcastRoom(roomId);
  });

  socket.on('disconnect', () => {
    table.touch();
    broadcastRoom(roomId);
  });
});

const PORT = Number(process.env.PORT || 5174);
server.listen(PORT, () => {
  console.log(`[riichi-table] listening on http://localhost:${PORT}`);
});
