// src/server/index.ts
// Entry point of the HTTP service.

import { loadServerConfig } from '../config/config.ts';
import type { ServerConfig } from '../config/config.ts';
import { buildServer } from './server.ts';

function loadConfigOrExit(): ServerConfig {
  try {
    return loadServerConfig(process.env);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const app = buildServer(config);

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

process.on('SIGTERM', () => {
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error(err);
      process.exit(1);
    },
  );
});
