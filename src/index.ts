import express from 'express';
import http from 'http';
import cors from 'cors';
import { Server } from 'socket.io';
import { readConfig } from './config';
import { ConfigurationReader } from './conf/ConfigurationReader';
import { GameConfigurationError, GameConfigurationNotFoundError } from './conf/errors';
import type { Table } from './game/Table';
import { gridView, stateFor } from './net/dto';
import type { ClientToServerEvents, InterServerEvents, ServerToClientEvents, SocketData } from './net/events';
import { parseMove, parseName } from './net/payload';
import { RoomManager } from './rooms/RoomManager';

const config = readConfig();
const reader = new ConfigurationReader(config.configDir);

const app = express();
app.use(cors());
app.get('/health', (_req, res) => res.json({ ok: true }));

app.get('/games/:name', (req, res, next) => {
  try {
    const def = reader.readGame(req.params.name);
    res.json({ gameName: def.gameName, rules: def.rules.map(r => r.id), grid: gridView(def.board) });
  } catch (e) {
    if (e instanceof GameConfigurationNotFoundError) return void res.status(404).json({ message: e.message });
    if (e instanceof GameConfigurationError) return void res.status(422).json({ message: e.message });
    next(e);
  }
});

const server = http.createServer(app);
const io = new Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, { cors: { origin: true, credentials: true } });

const rooms = new RoomManager(config.roomTtlMs, reader);

// simple cleanup timer
setInterval(() => rooms.cleanup(), 6 * 60 * 60 * 1000).unref();

function errorTo(socketId: string, message: string) {
  io.to(socketId).emit('errorMsg', { message });
}

function openTable(socketId: string, roomId: string, gameName: string): Table | null {
  try {
    return rooms.get(roomId, gameName);
  } catch (e) {
    if (!(e instanceof GameConfigurationError)) throw e;
    console.warn(`[nikoli-server] cannot open room ${roomId}: ${e.message}`);
    errorTo(socketId, e.message);
    return null;
  }
}

function broadcastRoom(roomId: string) {
  const table = rooms.find(roomId);
  if (!table) return;
  for (const s of io.sockets.sockets.values()) {
    if (s.data.roomId !== roomId) continue;
    s.emit('state', stateFor(table, s.id, s.connected));
  }
}

io.on('connection', (socket) => {
  const auth: Record<string, unknown> = socket.handshake.auth ?? {};
  const roomId = String(auth.roomId ?? '').trim();
  const clientId = String(auth.clientId ?? '').trim();
  const gameName = String(auth.game ?? config.defaultGame).trim();

  if (!roomId || !clientId) {
    errorTo(socket.id, 'Missing roomId/clientId.');
    socket.disconnect(true);
    return;
  }

  const table = openTable(socket.id, roomId, gameName);
  if (!table) {
    socket.disconnect(true);
    return;
  }

  const joinRes = table.joinOrReconnect({ clientId, socketId: socket.id });
  if (!joinRes.ok) {
    errorTo(socket.id, joinRes.message ?? 'Cannot join.');
    socket.disconnect(true);
    return;
  }

  socket.data.roomId = roomId;
  broadcastRoom(roomId);

  socket.on('setName', (payload: unknown) => {
    const n = parseName(payload);
    if (!n) return;
    table.setName(socket.id, n);
    table.message = `${n} joined.`;
    broadcastRoom(roomId);
  });

  socket.on('move', (payload: unknown) => {
    const move = parseMove(payload);
    if (!move) return errorTo(socket.id, 'Malformed move.');
    const r = table.play(socket.id, move.position, move.value);
    if (!r.ok) errorTo(socket.id, r.message);
    broadcastRoom(roomId);
  });

  socket.on('check', (payload: unknown) => {
    const move = parseMove(payload);
    if (!move) return errorTo(socket.id, 'Malformed move.');
    socket.emit('checkResult', table.check(socket.id, move.position, move.value));
  });

  socket.on('disconnect', () => {
    table.markOffline(socket.id);
    broadcastRoom(roomId);
  });
});

server.listen(config.port, () => {
  console.log(`[nikoli-server] listening on http://localhost:${config.port}`);
});
