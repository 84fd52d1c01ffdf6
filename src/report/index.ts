/**
 * Report generation module.
 * Deterministic: no wall clock, no IO.
 * Reduces step results into a RunReport and renders it as JSON + markdown.
 */

export { buildReport, computeSuccessRate, formatSuccessRate } from './reportBuilder.js';
export type { BuildReportOptions } from './reportBuilder.js';
export { generateMarkdown, generateJSON, serializeJSON, exitCodeFor } from './reporter.js';
