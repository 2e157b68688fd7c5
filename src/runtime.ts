import type { Logger } from 'pino';
import type { AppConfig } from './config.js';
import {
  AnalysisAgent,
  DiscoveryAgent,
  DiscoveryTrigger,
  EventBus,
  GenerationAgent,
  KeywordJobAnalyzer,
  MarkdownResumeRenderer,
  OptimizationAgent,
  StepCorrelator,
  StepDispatcher,
  WorkflowEngine,
  createLocalSteps,
} from './application/index.js';
import type { ApplicationRepository, BaseAgent, JobBoard } from './application/index.js';
import {
  InMemoryApplicationRepository,
  JsonFeedJobBoard,
  LocalDocumentStore,
  SampleJobBoard,
  createBroker,
  createDbClient,
  createDrizzleApplicationRepository,
  ensureSchema,
} from './infrastructure/index.js';
import type { DbClient } from './infrastructure/index.js';

/**
 * Composition root shared by the API process and the worker: one bus
 * and one repository per process, passed explicitly to everything.
 */

// ─── Infrastructure ───────────────────────────────────────────────

export interface Infrastructure {
  bus: EventBus;
  repository: ApplicationRepository;
  sql: DbClient['sql'] | null;
}

export function createInfrastructure(config: AppConfig, logger: Logger): Infrastructure {
  const broker = createBroker(config, logger);
  const bus = new EventBus({ broker, namespace: config.broker.namespace, logger });

  if (config.databaseUrl === undefined) {
    logger.warn('DATABASE_URL not set, using the in-memory application repository');
    return { bus, repository: new InMemoryApplicationRepository(), sql: null };
  }

  const { sql, db } = createDbClient({ databaseUrl: config.databaseUrl, cellId: config.cellId });
  return { bus, repository: createDrizzleApplicationRepository(db), sql };
}

/** Connects the broker and makes sure the tables exist. */
export async function openInfrastructure(infra: Infrastructure, logger: Logger): Promise<void> {
  await infra.bus.connect();
  if (infra.sql !== null) {
    await ensureSchema(infra.sql);
    logger.info('Database ready (job_applications + resume_versions tables)');
  }
}

export async function closeInfrastructure(infra: Infrastructure): Promise<void> {
  await infra.bus.disconnect();
  await infra.sql?.end();
}

// ─── Agents ───────────────────────────────────────────────────────

export interface AgentSet {
  discovery: DiscoveryAgent;
  analysis: AnalysisAgent;
  generation: GenerationAgent;
  optimization: OptimizationAgent;
  trigger: DiscoveryTrigger;
  all: readonly BaseAgent[];
}

function createJobBoards(config: AppConfig): JobBoard[] {
  if (config.jobFeedUrl === undefined) {
    return [new SampleJobBoard()];
  }
  return [new JsonFeedJobBoard({ name: 'feed', url: config.jobFeedUrl })];
}

export function createAgents(config: AppConfig, infra: Infrastructure, logger: Logger): AgentSet {
  const common = { bus: infra.bus, cellId: config.cellId, logger };
  const repository = infra.repository;

  const discovery = new DiscoveryAgent({ ...common, boards: createJobBoards(config), repository });
  const analysis = new AnalysisAgent({ ...common, repository, analyzer: new KeywordJobAnalyzer() });
  const generation = new GenerationAgent({
    ...common,
    repository,
    renderer: new MarkdownResumeRenderer(),
    documents: new LocalDocumentStore(config.documentDir),
  });
  const optimization = new OptimizationAgent({ ...common, repository });
  const trigger = new DiscoveryTrigger({ bus: infra.bus, agent: discovery, cellId: config.cellId, logger });

  return {
    discovery,
    analysis,
    generation,
    optimization,
    trigger,
    all: [discovery, analysis, generation, optimization],
  };
}

/** Starts every consume loop in the background; failures are logged. */
export function startAgents(agents: AgentSet, logger: Logger): void {
  for (const agent of agents.all) {
    void agent.start().catch((err: unknown) => {
      logger.error({ err, agent_id: agent.agentId }, 'Agent stopped unexpectedly');
    });
  }
  void agents.trigger.start().catch((err: unknown) => {
    logger.error({ err }, 'Discovery trigger stopped unexpectedly');
  });
}

export async function stopAgents(agents: AgentSet): Promise<void> {
  await agents.trigger.stop();
  await Promise.all(agents.all.map((agent) => agent.stop()));
}

// ─── Engine ───────────────────────────────────────────────────────

export interface EngineSet {
  engine: WorkflowEngine;
  correlator: StepCorrelator;
}

export function createEngine(config: AppConfig, infra: Infrastructure, logger: Logger): EngineSet {
  const correlator = new StepCorrelator({ bus: infra.bus, cellId: config.cellId, logger });
  const dispatcher = new StepDispatcher({
    publisher: infra.bus,
    correlator,
    functions: createLocalSteps({ repository: infra.repository, publisher: infra.bus, cellId: config.cellId }),
    cellId: config.cellId,
    logger,
  });
  const engine = new WorkflowEngine({
    publisher: infra.bus,
    dispatcher,
    cellId: config.cellId,
    logger,
    maxCompletedWorkflows: config.engine.maxCompletedWorkflows,
    cleanupIntervalMs: config.engine.cleanupIntervalMs,
  });
  return { engine, correlator };
}

/**
 * Joins the reply topics, waits until the group is in place, then
 * starts the history sweep. Workflows must not start before this
 * resolves: their agent replies could land before the group exists.
 */
export async function startEngine(set: EngineSet, logger: Logger): Promise<void> {
  void set.correlator.start().catch((err: unknown) => {
    logger.error({ err }, 'Step correlator stopped unexpectedly');
  });
  await set.correlator.ready();
  set.engine.start();
}
