import { formatCitationList, type Citation } from '../citations/tracker.js';
import type { HelmRenderReport, PipelineSyntaxReport, TerraformPlanReport } from '../parsers/types.js';
import type { InfrastructureRequest } from './requests.js';

const mark = (passed: boolean) => (passed ? 'yes' : 'no');

function citationSection(citations: readonly Citation[]): string {
  if (citations.length === 0) return 'No knowledge base sources referenced.';
  return formatCitationList(citations).join('\n');
}

function terraformSection(report: TerraformPlanReport | undefined): string[] {
  if (!report) return [];
  return [
    '### Terraform Plan',
    `- **Status**: ${report.status}`,
    `- **Resources to add**: ${report.summary.add}`,
    `- **Resources to change**: ${report.summary.change}`,
    `- **Resources to destroy**: ${report.summary.destroy}`,
    ...(report.summary.drift.length > 0 ? [`- **Drifted resources**: ${report.summary.drift.length}`] : []),
    '',
  ];
}

function helmSection(report: HelmRenderReport | undefined): string[] {
  if (!report) return [];
  return [
    report.stage === 'template' ? '### Helm Template' : '### Helm Dry-Run',
    `- **Status**: ${report.status}`,
    `- **Lint passed**: ${mark(report.lint.passed)}`,
    `- **Manifests generated**: ${report.manifests.length}`,
    '',
  ];
}

export function infrastructureBody(
  request: InfrastructureRequest,
  reports: { terraform?: TerraformPlanReport; helm?: HelmRenderReport },
  citations: readonly Citation[],
): string {
  const components: string[] = [];
  if (request.terraform) components.push(`- Terraform: ${Object.keys(request.terraform.files).length} file(s) under \`infra/\``);
  if (request.helm) components.push(`- Helm chart: ${Object.keys(request.helm.files).length} file(s) under \`deploy/chart/\``);

  return [
    '# F-Ops Generated Infrastructure Configuration',
    '',
    `This PR adds infrastructure configuration for **${request.target}** deployment.`,
    '',
    '## Configuration Summary',
    `- **Target Platform**: ${request.target}`,
    `- **Environments**: ${request.environments.join(', ') || 'none'}`,
    `- **Domain**: ${request.domain || 'none'}`,
    '',
    '## Generated Components',
    ...components,
    '',
    '## Validation Results',
    '',
    ...terraformSection(reports.terraform),
    ...helmSection(reports.helm),
    '## Knowledge Base Citations',
    citationSection(citations),
    '',
    '---',
    '*Generated by F-Ops Infrastructure Agent*',
    '*Review all changes and plan outputs before merging*',
    '',
  ].join('\n');
}

export function pipelineBody(report: PipelineSyntaxReport, citations: readonly Citation[]): string {
  return [
    '# F-Ops Generated CI/CD Pipeline',
    '',
    `This PR adds \`${report.summary.path}\`.`,
    '',
    '## Knowledge Base Citations',
    citationSection(citations),
    '',
    '## Validation Results',
    `- **Status**: ${report.status}`,
    `- **Platform**: ${report.summary.platform}`,
    `- **Jobs**: ${report.summary.jobs.join(', ') || 'none'}`,
    '',
    '---',
    '*Generated by F-Ops Pipeline Agent*',
    '*Review all changes before merging*',
    '',
  ].join('\n');
}
