import { loadConfig } from './config.js';
import { createLogger } from './infrastructure/index.js';
import { buildServer } from './interfaces/http/index.js';
import {
  closeInfrastructure,
  createAgents,
  createEngine,
  createInfrastructure,
  openInfrastructure,
  startAgents,
  startEngine,
  stopAgents,
} from './runtime.js';

/**
 * API process: HTTP + workflow engine.
 *
 * Order:
 * 1) Config, broker, repository
 * 2) Engine (and agents, when they share this process)
 * 3) HTTP routes + shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, 'jobflow-api');

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  const infra = createInfrastructure(config, logger);
  await openInfrastructure(infra, logger);

  // --------------------------------------------------
  // Engine + in-process agents
  // --------------------------------------------------

  const engineSet = createEngine(config, infra, logger);
  const agents = config.runAgentsInProcess ? createAgents(config, infra, logger) : null;

  if (agents !== null) {
    startAgents(agents, logger);
    logger.info({ agents: agents.all.map((a) => a.agentId) }, 'Agents running in-process');
  }
  await startEngine(engineSet, logger);

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = await buildServer({
    engine: engineSet.engine,
    agents: agents?.all ?? [],
    discovery: agents?.discovery ?? null,
    logLevel: config.logLevel,
  });

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    if (agents !== null) {
      await stopAgents(agents);
    }
    await engineSet.correlator.stop();
    await closeInfrastructure(infra);
  });

  const shutdown = (): void => {
    logger.info('Shutting down API...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.http.host,
    port: config.http.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
