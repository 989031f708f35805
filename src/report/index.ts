/**
 * Report generation module.
 * Turns a run summary into JSON, markdown and the stderr recap.
 */

export { generateMarkdown, generateJSON, serializeJSON, formatSummary } from './reporter.js';
export type { JsonOutput, JsonOutputAction } from './reporter.js';
