import { z } from 'zod';
import { DEFAULT_CELL_ID, DEFAULT_EVENT_NAMESPACE } from './domain/index.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variables read at startup. Everything has a local
 * development default except DATABASE_URL: without it the in-memory
 * repository is used.
 */
const envSchema = z.object({
  CELL_ID: z.string().min(1).default(DEFAULT_CELL_ID),
  EVENT_NAMESPACE: z.string().min(1).default(DEFAULT_EVENT_NAMESPACE),
  BROKER_TRANSPORT: z.enum(['kafka', 'redis', 'memory']).default('memory'),
  KAFKA_BROKERS: z.string().min(1).default('localhost:9092'),
  KAFKA_CLIENT_ID: z.string().min(1).default('jobflow-orchestrator'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  WORKER_ID: z.string().min(1).optional(),
  BROKER_PARTITIONS: z.coerce.number().int().min(1).max(64).default(3),
  AUTO_COMMIT_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1).optional(),
  MAX_COMPLETED_WORKFLOWS: z.coerce.number().int().positive().default(100),
  WORKFLOW_CLEANUP_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000),
  DOCUMENT_DIR: z.string().min(1).default('.data/documents'),
  JOB_FEED_URL: z.string().url().optional(),
  RUN_AGENTS_IN_PROCESS: booleanFlag.optional(),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  cellId: string;
  logLevel: string;
  broker: {
    transport: 'kafka' | 'redis' | 'memory';
    namespace: string;
    kafkaBrokers: string[];
    kafkaClientId: string;
    redisUrl: string;
    consumerName: string | undefined;
    partitions: number;
    autoCommitIntervalMs: number;
  };
  databaseUrl: string | undefined;
  engine: {
    maxCompletedWorkflows: number;
    cleanupIntervalMs: number;
  };
  documentDir: string;
  jobFeedUrl: string | undefined;
  /** Agents share the API process; forced on for the in-memory transport. */
  runAgentsInProcess: boolean;
  http: {
    host: string;
    port: number;
  };
}

/**
 * Validates the environment and shapes it into the runtime config.
 * Throws a ZodError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const transport = parsed.BROKER_TRANSPORT;

  return {
    cellId: parsed.CELL_ID,
    logLevel: parsed.LOG_LEVEL,
    broker: {
      transport,
      namespace: parsed.EVENT_NAMESPACE,
      kafkaBrokers: parsed.KAFKA_BROKERS.split(',').map((b) => b.trim()).filter((b) => b !== ''),
      kafkaClientId: parsed.KAFKA_CLIENT_ID,
      redisUrl: parsed.REDIS_URL,
      consumerName: parsed.WORKER_ID,
      partitions: parsed.BROKER_PARTITIONS,
      autoCommitIntervalMs: parsed.AUTO_COMMIT_INTERVAL_MS,
    },
    databaseUrl: parsed.DATABASE_URL,
    engine: {
      maxCompletedWorkflows: parsed.MAX_COMPLETED_WORKFLOWS,
      cleanupIntervalMs: parsed.WORKFLOW_CLEANUP_INTERVAL_MS,
    },
    documentDir: parsed.DOCUMENT_DIR,
    jobFeedUrl: parsed.JOB_FEED_URL,
    runAgentsInProcess: transport === 'memory' || (parsed.RUN_AGENTS_IN_PROCESS ?? false),
    http: {
      host: parsed.HOST,
      port: parsed.PORT,
    },
  };
}
