/**
 * socket.d.ts - Event maps for the Socket.IO server and the freshness namespace.
 */

import type { Namespace, Socket } from 'socket.io';
import type { FreshnessReading } from '../services/freshnessSimulator';

// The freshness feed is push-only.
export interface ClientToServerEvents {}

export interface ServerToClientEvents {
  'freshness:reading': (reading: FreshnessReading) => void;
}

export type FreshnessNamespace = Namespace<ClientToServerEvents, ServerToClientEvents>;

export type FreshnessSocket = Socket<ClientToServerEvents, ServerToClientEvents>;
