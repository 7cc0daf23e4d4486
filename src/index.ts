/**
 * index.ts - Server entry point.
 * Loads configuration, opens the record store, and serves the REST API and the
 * Socket.IO freshness feed on one HTTP server.
 */

import http from 'http';
import mongoose from 'mongoose';
import { createApp } from './app';
import { loadConfig } from './config/config';
import { mathRandomSource } from './services/randomSource';
import { setupFreshnessHandlers } from './socket/freshnessHandlers';
import { initializeSocketIO } from './socket/socketServer';
import { MemoryRecordStore } from './store/memoryRecordStore';
import { MongoRecordStore } from './store/mongoRecordStore';
import type { RecordStore } from './store/recordStore';
import type { AppConfig } from './config/config';

async function openStore(config: AppConfig): Promise<RecordStore> {
  if (config.storeDriver === 'memory') {
    console.log('[Store] Using in-memory store, data is lost on restart');
    return new MemoryRecordStore();
  }

  if (!config.mongoUri) {
    throw new Error('Set MONGO_URI in your .env file');
  }

  try {
    await mongoose.connect(config.mongoUri);
    console.log('[Store] MongoDB connected');
  } catch (error) {
    console.error('[Store] Could not connect to MongoDB:', error);
    throw error;
  }

  return new MongoRecordStore(mongoose.connection);
}

async function start(): Promise<void> {
  const config = loadConfig();
  const production = config.nodeEnv === 'production';

  if (production) {
    console.log('Allowed CORS origins:', config.allowedOrigins);
  }

  const store = await openStore(config);
  const deps = { store, random: mathRandomSource, now: () => new Date() };

  const app = createApp(deps, { allowedOrigins: config.allowedOrigins, production });
  const httpServer = http.createServer(app);

  const io = initializeSocketIO(httpServer, config.allowedOrigins, production);
  setupFreshnessHandlers(io, {
    intervalMs: config.freshnessIntervalMs,
    random: deps.random,
    now: deps.now,
  });

  const host = production ? '0.0.0.0' : 'localhost';

  httpServer.listen(config.port, host, () => {
    console.log(`Server ready at http://${host}:${config.port}`);
    console.log('Freshness feed available on Socket.IO namespace /freshness');
  });
}

void start().catch((error) => {
  console.error('Backend failed to start:', error);
  process.exit(1);
});
