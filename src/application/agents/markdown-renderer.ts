import type { RenderedDocument, ResumeRenderInput, ResumeRenderer } from './collaborators.js';

const TEMPLATE_HEADINGS: Record<string, string> = {
  modern_professional: 'Professional Resume',
  senior_professional: 'Senior Professional Resume',
  executive_professional: 'Executive Resume',
};

/**
 * Renders a targeted resume outline as Markdown. Real layout engines
 * plug in behind the same interface.
 */
export class MarkdownResumeRenderer implements ResumeRenderer {
  async render(input: ResumeRenderInput): Promise<RenderedDocument> {
    const { job, analysis, template } = input;
    const lines = [
      `# ${TEMPLATE_HEADINGS[template] ?? 'Resume'}`,
      '',
      `Target role: **${job.position}** at **${job.company}** (${job.location})`,
      '',
    ];

    if (analysis !== null) {
      lines.push('## Summary', '', analysis.summary, '');
      if (analysis.required_skills.length > 0) {
        lines.push('## Core Skills', '', ...analysis.required_skills.map((s) => `- ${s}`), '');
      }
      if (analysis.preferred_skills.length > 0) {
        lines.push('## Additional Skills', '', ...analysis.preferred_skills.map((s) => `- ${s}`), '');
      }
    }

    lines.push('## Experience', '', '_Tailored experience highlights go here._', '');

    return {
      content: lines.join('\n'),
      content_type: 'text/markdown',
      extension: 'md',
    };
  }
}
