/**
 * freshnessHandlers.ts - Simulated freshness telemetry over Socket.IO.
 * Clients join /freshness with ?listingId=... and receive one reading per tick
 * until they disconnect.
 */

import { FreshnessSimulator } from '../services/freshnessSimulator';
import type { RandomSource } from '../services/randomSource';
import type { FreshnessNamespace, FreshnessSocket } from '../types/socket';
import type { AppSocketServer } from './socketServer';

export const FRESHNESS_NAMESPACE = '/freshness';

export interface FreshnessFeedOptions {
  intervalMs: number;
  random: RandomSource;
  now: () => Date;
}

function readListingId(socket: FreshnessSocket): string | null {
  const raw = socket.handshake.query.listingId;
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

export function setupFreshnessHandlers(io: AppSocketServer, options: FreshnessFeedOptions): void {
  const namespace: FreshnessNamespace = io.of(FRESHNESS_NAMESPACE);

  namespace.use((socket, next) => {
    if (!readListingId(socket)) {
      console.warn('[Socket] Freshness connection rejected: listingId missing');
      next(new Error('listingId query parameter is required'));
      return;
    }
    next();
  });

  namespace.on('connection', (socket) => {
    const listingId = readListingId(socket);
    if (!listingId) {
      socket.disconnect(true);
      return;
    }

    const simulator = new FreshnessSimulator(listingId, options.random, options.now);
    console.log(`[Socket] Freshness feed opened for listing ${listingId} (socket: ${socket.id})`);

    const timer = setInterval(() => {
      socket.emit('freshness:reading', simulator.next());
    }, options.intervalMs);

    socket.on('disconnect', () => {
      clearInterval(timer);
      console.log(`[Socket] Freshness feed closed for listing ${listingId} (socket: ${socket.id})`);
    });
  });
}
