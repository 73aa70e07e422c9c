/**
 * Server Entry Point
 *
 * Displays the banner, initializes every client, then serves the Hono
 * app on Node. SIGINT and SIGTERM close the HTTP server, the records pool,
 * the Neo4j driver and remote MCP sessions before exiting.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { closeClients, getClients } from '@/server/clients';
import { checkHealth } from '@/server/health';
import { app } from '@/server/index';
import { describeLLM, displayBanner, displayStartup, logError } from '@/utils';

async function main(): Promise<void> {
  const config = getConfig();

  // Display banner immediately
  displayBanner();

  // Initialize clients eagerly so startup shows what is reachable
  const clients = await getClients();
  const { dependentServices: up } = await checkHealth(clients.health);

  await displayStartup(config, {
    graph: { location: clients.graphStore.location, healthy: up.graph },
    records: { location: clients.records.location, healthy: up.records },
    diabetesModel: { location: clients.predictions.diabetes.location, healthy: up.diabetesModel },
    cardioModel: { location: clients.predictions.cardio.location, healthy: up.cardioModel },
    llm: describeLLM(config),
    tools: clients.registry.list().map((tool) => tool.name),
    discovery: clients.discovery
  });

  const server = serve({ fetch: app.fetch, port: config.server.port });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n  Received ${signal}, shutting down...`);

    server.close();
    closeClients().then(
      () => process.exit(0),
      (error: unknown) => {
        logError('shutdown', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logError('startup', error);
  process.exit(1);
});
