export { BaseAgent, ORIGIN_WORKFLOW_KEY } from './base-agent.js';
export type { AgentHealth, AgentOptions, AgentOutput, AgentStatus, DerivedEvent } from './base-agent.js';
export type {
  ApplicationRepository,
  DocumentStore,
  JobAnalysisInput,
  JobAnalyzer,
  JobApplicationFilter,
  JobBoard,
  JobSearchQuery,
  RenderedDocument,
  ResumeRenderInput,
  ResumeRenderer,
} from './collaborators.js';
export { buildAgentErrorEvent, buildTaskCompletedEvent, readStepRequest } from './task-replies.js';
export type { StepRequestRef } from './task-replies.js';
export { DiscoveryAgent, scrapeRequestSchema } from './discovery-agent.js';
export type { DiscoveryAgentOptions, ScrapeRequest, ScrapeResult } from './discovery-agent.js';
export { DiscoveryTrigger } from './discovery-trigger.js';
export type { DiscoveryTriggerOptions } from './discovery-trigger.js';
export { AnalysisAgent } from './analysis-agent.js';
export type { AnalysisAgentOptions } from './analysis-agent.js';
export { KeywordJobAnalyzer, analyzeByKeywords, detectExperienceLevel, detectJobType } from './keyword-analyzer.js';
export { jobAnalysisSchema, readStoredAnalysis } from './job-analysis.js';
export { GenerationAgent, RESUME_TEMPLATES, selectTemplate } from './generation-agent.js';
export type { GenerationAgentOptions, ResumeTemplate } from './generation-agent.js';
export { MarkdownResumeRenderer } from './markdown-renderer.js';
export {
  OptimizationAgent,
  MIN_APPLICATIONS_FOR_ANALYSIS,
  buildRecommendations,
  summarizePerformance,
} from './optimization-agent.js';
export type { OptimizationAgentOptions, PerformanceRating, PerformanceSummary, TrackedResume } from './optimization-agent.js';
