import type { StepHandler, WorkflowDefinition, WorkflowTemplate } from '../../domain/index.js';

const agent = (role: 'discovery' | 'analysis' | 'generation' | 'optimization'): StepHandler => ({ kind: 'agent', role });
const fn = (name: string): StepHandler => ({ kind: 'function', name });

export const WorkflowType = {
  JOB_APPLICATION: 'job_application',
  QUICK_RESUME: 'quick_resume',
  BULK_APPLICATION: 'bulk_application',
  OPTIMIZATION: 'optimization',
} as const;

export type WorkflowType = (typeof WorkflowType)[keyof typeof WorkflowType];

/**
 * Built-in workflow types. Each is a plain table of step specs; the
 * workflow machinery is the same for all of them. Context keys produced
 * by one step (e.g. `job_ids` from discovery) feed the next.
 */
export const DEFAULT_WORKFLOW_DEFINITIONS: readonly WorkflowDefinition[] = [
  {
    workflow_type: WorkflowType.JOB_APPLICATION,
    template_id: 'new_job_search',
    name: 'New Job Search',
    description: 'Complete job search workflow for new opportunities',
    estimated_duration: '30-60 minutes',
    steps: [
      {
        step_id: 'discover_jobs',
        name: 'Discover Relevant Jobs',
        handler: agent('discovery'),
        input_data: { search_terms: [], location: 'Remote', max_jobs: 10 },
        timeout_seconds: 120,
        retry_count: 2,
      },
      {
        step_id: 'analyze_jobs',
        name: 'Analyze Job Requirements',
        handler: agent('analysis'),
        timeout_seconds: 300,
        retry_count: 3,
      },
      {
        step_id: 'generate_resumes',
        name: 'Generate Customized Resumes',
        handler: agent('generation'),
        input_data: { template: 'modern_professional', generate_multiple_versions: true },
        timeout_seconds: 180,
        retry_count: 2,
      },
      {
        step_id: 'optimize_resumes',
        name: 'Optimize Resume Content',
        handler: agent('optimization'),
        input_data: { optimization_type: 'ats_optimization' },
        timeout_seconds: 120,
        retry_count: 1,
        required: false,
      },
      {
        step_id: 'submit_applications',
        name: 'Submit Job Applications',
        handler: fn('submit_applications'),
        input_data: { auto_submit: false, submission_delay: 300 },
        timeout_seconds: 600,
        retry_count: 1,
        required: false,
      },
      {
        step_id: 'setup_tracking',
        name: 'Setup Application Tracking',
        handler: fn('setup_tracking'),
        input_data: { follow_up_schedule: 'weekly', status_check_interval: 3 },
        timeout_seconds: 60,
        retry_count: 1,
        required: false,
      },
    ],
  },
  {
    workflow_type: WorkflowType.QUICK_RESUME,
    template_id: 'single_job_application',
    name: 'Single Job Application',
    description: 'Quick resume generation for a specific job',
    estimated_duration: '5-10 minutes',
    steps: [
      {
        step_id: 'analyze_job',
        name: 'Analyze Job Requirements',
        handler: agent('analysis'),
        timeout_seconds: 180,
        retry_count: 2,
      },
      {
        step_id: 'generate_resume',
        name: 'Generate Customized Resume',
        handler: agent('generation'),
        input_data: { template: 'modern_professional' },
        timeout_seconds: 120,
        retry_count: 2,
      },
      {
        step_id: 'optimize_resume',
        name: 'Optimize Resume Content',
        handler: agent('optimization'),
        input_data: { optimization_type: 'job_specific' },
        timeout_seconds: 90,
        retry_count: 1,
        required: false,
      },
    ],
  },
  {
    workflow_type: WorkflowType.BULK_APPLICATION,
    template_id: 'bulk_job_hunting',
    name: 'Bulk Job Applications',
    description: 'High-volume job applications with automation',
    estimated_duration: '2-4 hours',
    steps: [
      {
        step_id: 'bulk_discover_jobs',
        name: 'Bulk Job Discovery',
        handler: agent('discovery'),
        input_data: { search_terms: [], location: 'Remote', max_jobs: 50 },
        timeout_seconds: 600,
        retry_count: 2,
      },
      {
        step_id: 'batch_analyze_jobs',
        name: 'Batch Analyze Jobs',
        handler: agent('analysis'),
        timeout_seconds: 900,
        retry_count: 1,
      },
      {
        step_id: 'smart_generate_resumes',
        name: 'Smart Resume Generation',
        handler: agent('generation'),
        timeout_seconds: 1200,
        retry_count: 1,
      },
      {
        step_id: 'bulk_optimize',
        name: 'Bulk Resume Optimization',
        handler: agent('optimization'),
        input_data: { optimization_type: 'bulk_ats' },
        timeout_seconds: 600,
        retry_count: 1,
        required: false,
      },
      {
        step_id: 'staged_submission',
        name: 'Staged Application Submission',
        handler: fn('staged_submission'),
        input_data: { daily_limit: 20, submission_spacing: 900 },
        timeout_seconds: 3600,
        retry_count: 1,
        required: false,
      },
    ],
  },
  {
    workflow_type: WorkflowType.OPTIMIZATION,
    template_id: 'resume_improvement',
    name: 'Resume Optimization',
    description: 'Improve existing resumes based on performance data',
    estimated_duration: '15-30 minutes',
    steps: [
      {
        step_id: 'analyze_performance',
        name: 'Analyze Resume Performance',
        handler: agent('optimization'),
        input_data: { optimization_type: 'performance_review' },
        timeout_seconds: 180,
        retry_count: 1,
      },
      {
        step_id: 'identify_patterns',
        name: 'Identify Success Patterns',
        handler: agent('optimization'),
        input_data: { optimization_type: 'pattern_recognition' },
        timeout_seconds: 120,
        retry_count: 1,
        required: false,
      },
      {
        step_id: 'generate_recommendations',
        name: 'Generate Optimization Recommendations',
        handler: agent('optimization'),
        input_data: { optimization_type: 'comprehensive' },
        timeout_seconds: 300,
        retry_count: 2,
      },
      {
        step_id: 'apply_improvements',
        name: 'Apply Recommended Improvements',
        handler: agent('generation'),
        input_data: { improvement_mode: true },
        timeout_seconds: 180,
        retry_count: 1,
        required: false,
      },
    ],
  },
];

/** Indexes definitions by workflow type; later entries replace earlier ones. */
export function buildCatalog(definitions: readonly WorkflowDefinition[]): ReadonlyMap<string, WorkflowDefinition> {
  return new Map(definitions.map((d) => [d.workflow_type, d]));
}

export function toTemplate(definition: WorkflowDefinition): WorkflowTemplate {
  return {
    template_id: definition.template_id,
    workflow_type: definition.workflow_type,
    name: definition.name,
    description: definition.description,
    estimated_duration: definition.estimated_duration,
    steps: definition.steps.length,
  };
}
