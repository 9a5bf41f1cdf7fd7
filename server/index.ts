/**
 * Jam Queue Server
 *
 * This file starts an HTTP server that:
 * 1. Serves the JSON API (/jams, /songs, /health)
 * 2. Pushes jam events over Socket.IO (/ws/<jamId>)
 * 3. Manages SQLite persistence
 *
 * Start with: npm run start (after npm run build)
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';

// Load environment variables from .env file
dotenvConfig({ path: resolve(process.cwd(), '.env') });

import { mkdirSync } from 'fs';
import { loadConfig } from './config';
import { createJamServer } from './server';

async function main() {
  const config = loadConfig();

  // Ensure the database directory exists
  mkdirSync(config.dataDir, { recursive: true });
  mkdirSync(dirname(config.dbPath), { recursive: true });

  const server = createJamServer(config);
  const address = await server.listen();

  console.log(`[Server] Listening on http://${address.address}:${address.port}`);
  console.log(`[Server] Database: ${config.dbPath}`);
  console.log(`[Server] Manager routes: ${config.managerToken ? 'token required' : 'open'}`);

  let shuttingDown = false;

  function shutdown(signal: NodeJS.Signals): void {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n[Server] ${signal} received, shutting down gracefully...`);

    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Error during shutdown:', err);
        process.exit(1);
      }
    );
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
