/**
 * socketServer.ts - Socket.IO server bound to the HTTP server.
 * WebSocket transport only, same origin policy as the REST API.
 */

import { Server as HTTPServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createOriginValidator } from '../config/cors';
import type { ClientToServerEvents, ServerToClientEvents } from '../types/socket';

export type AppSocketServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents>;

export function initializeSocketIO(httpServer: HTTPServer, allowedOrigins: string[], production: boolean): AppSocketServer {
  return new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    transports: ['websocket'],
    cors: {
      origin: createOriginValidator(allowedOrigins, production),
      credentials: true,
      methods: ['GET', 'POST'],
    },
  });
}
