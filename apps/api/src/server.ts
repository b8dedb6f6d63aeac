import 'dotenv/config';
import { applySchema, closePool, getPool } from '@cargotrace/adapters';
import { buildApp, buildHttpServer } from './app.js';
import { loadConfig } from './config/app.config.js';
import { createContainer, memoryInfrastructure, pgInfrastructure } from './container.js';
import { WsGateway } from './ws/ws-gateway.js';

async function main() {
  const config = loadConfig();

  if (config.storage === 'pg') {
    await getPool(config.databaseUrl).query('SELECT 1');
    console.log('[server] database connected');
    if (config.applySchemaOnStart) await applySchema();
  } else {
    console.warn('[server] STORAGE=memory: state is lost on restart');
  }

  const infra = config.storage === 'pg' ? pgInfrastructure(config) : memoryInfrastructure();
  const gateway = new WsGateway();
  const container = createContainer(config, infra, { transport: gateway });

  // Sagas interrupted by a previous crash are compensated before traffic arrives.
  const recovered = await container.cancellation.recover();
  if (recovered.length) console.log(`[server] recovered ${recovered.length} saga(s)`);

  const app = buildApp(container, { corsOrigin: config.corsOrigin });
  const httpServer = buildHttpServer(app, gateway);

  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    await gateway.close();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    if (config.storage === 'pg') await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown failed', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
