export { default as orchestratorPlugin } from './orchestrator-plugin.js';
export type { OrchestratorPluginOptions } from './orchestrator-plugin.js';
export { default as workflowRoutes } from './workflow-routes.js';
export { default as agentRoutes } from './agent-routes.js';
export { buildServer } from './server.js';
export type { BuildServerOptions } from './server.js';
