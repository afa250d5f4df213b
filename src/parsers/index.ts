/**
 * Tool output parsers: raw sandbox runs in, frozen ValidationReports out.
 */
import { HelmRenderParser } from './helm_render.js';
import { TerraformPlanParser } from './terraform_plan.js';
import type { HelmRenderReport, TerraformPlanReport, ToolOutputParser } from './types.js';

export interface ParserSet {
  terraform: ToolOutputParser<TerraformPlanReport>;
  helm: ToolOutputParser<HelmRenderReport>;
}

export const createParsers = (): ParserSet => ({
  terraform: new TerraformPlanParser(),
  helm: new HelmRenderParser(),
});

export * from './types.js';
export { TerraformPlanParser, parsePlanMessages, summarizePlan } from './terraform_plan.js';
export {
  HelmRenderParser,
  ManifestStreamParser,
  extractManifests,
  extractNotes,
  parseLintOutput,
  summarizeManifests,
} from './helm_render.js';
export { chartPreflight, checkChart } from './helm_chart.js';
export { validatePipelineSyntax, detectPlatform } from './pipeline_syntax.js';
