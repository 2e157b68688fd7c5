import { loadConfig } from './config.js';
import { createLogger } from './infrastructure/index.js';
import {
  closeInfrastructure,
  createAgents,
  createInfrastructure,
  openInfrastructure,
  startAgents,
  stopAgents,
} from './runtime.js';

/**
 * Standalone agent process: discovery, analysis, generation and
 * optimization agents plus the discovery trigger.
 *
 * Runs independently of the API. Scale out by launching more instances
 * with different WORKER_ID values; each agent role shares one consumer
 * group per cell, so partitions are spread across instances.
 */
const config = loadConfig();
const log = createLogger(config.logLevel, 'jobflow-worker');

const infra = createInfrastructure(config, log);
const agents = createAgents(config, infra, log);

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<void> {
  await openInfrastructure(infra, log);
  log.info({ transport: config.broker.transport, cell_id: config.cellId }, 'Broker connected');

  startAgents(agents, log);
  log.info({ agents: agents.all.map((a) => a.agentId) }, 'Agents started');

  await new Promise<void>((resolve) => {
    ac.signal.addEventListener('abort', () => resolve(), { once: true });
  });

  await stopAgents(agents);
  await closeInfrastructure(infra);
  log.info('Worker stopped');
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  if (ac.signal.aborted) return;
  log.info('Shutting down worker...');
  ac.abort();

  // Give in-flight handlers a moment, then force exit
  setTimeout(() => process.exit(0), 10_000).unref();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().then(
  () => process.exit(0),
  (err: unknown) => {
    log.fatal({ err }, 'Worker crashed');
    process.exit(1);
  },
);
