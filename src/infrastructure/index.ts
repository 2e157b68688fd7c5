export * from './broker/index.js';
export * from './db/index.js';
export { InMemoryApplicationRepository } from './repositories/in-memory-application-repository.js';
export { LocalDocumentStore } from './storage/local-document-store.js';
export { JsonFeedJobBoard } from './job-boards/json-feed-board.js';
export type { JsonFeedJobBoardOptions } from './job-boards/json-feed-board.js';
export { SampleJobBoard } from './job-boards/sample-job-board.js';
export { createLogger } from './logger.js';
