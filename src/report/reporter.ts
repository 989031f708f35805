import type { ActionOutcome, RunSummary } from '../schema/index.js';
import { isRunSuccessful } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputAction } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputAction };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: RunSummary, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    result: isRunSuccessful(run) ? 'PASS' : 'FAIL',
    url: run.targetUrl,
    host: run.host,
    browser: run.browser,
    authenticated: run.authenticated,
    finalState: run.finalState,
    error: run.error ?? null,
    startedAt: run.startedAt,
    durationMs: run.durationMs,
    exitCode,
    actions: run.outcomes.map(actionToJSON),
  };
}

function actionToJSON(outcome: ActionOutcome): JsonOutputAction {
  return {
    name: outcome.action,
    result: outcome.success ? 'PASS' : 'FAIL',
    failure: outcome.failure ?? null,
    archivedPath: outcome.archivedPath ?? null,
    message: outcome.message,
    durationMs: outcome.durationMs,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: RunSummary): string {
  const lines: string[] = [];
  const verdict = isRunSuccessful(run) ? 'PASS' : 'FAIL';

  lines.push(`# Unisphere Backup Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **URL** | ${run.targetUrl} |`);
  lines.push(`| **Host** | ${run.host} |`);
  lines.push(`| **Browser** | ${run.browser} |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Result** | **${verdict}** |`);
  if (run.error !== undefined) {
    lines.push(`| **Error** | ${escapeMarkdownCell(run.error)} |`);
  }
  lines.push('');

  lines.push(`## Actions`);
  lines.push('');
  if (run.outcomes.length === 0) {
    lines.push('_No action ran._');
  } else {
    lines.push(`| Action | Result | Failure | Duration | Detail |`);
    lines.push(`|--------|--------|---------|----------|--------|`);
    for (const o of run.outcomes) {
      lines.push(
        `| ${o.action} | ${o.success ? 'PASS' : 'FAIL'} | ${o.failure ?? '-'} | ${formatDuration(o.durationMs)} | ${escapeMarkdownCell(o.message)} |`,
      );
    }
  }
  lines.push('');

  return lines.join('\n');
}

// ── Stderr summary ───────────────────────────────────────────

export function formatSummary(run: RunSummary): string {
  const passed = run.outcomes.filter((o) => o.success).length;
  const failed = run.outcomes.length - passed;
  const lines = [
    '',
    '--- Unisphere Backup Result ---',
    `URL:      ${run.targetUrl}`,
    `State:    ${run.finalState}`,
    `Actions:  ${String(passed)} succeeded, ${String(failed)} failed`,
  ];
  for (const o of run.outcomes) {
    lines.push(`  ${o.success ? '✅' : '❌'} ${o.action}: ${o.message}`);
  }
  if (run.error !== undefined) lines.push(`Error:    ${run.error}`);
  lines.push(`Time:     ${(run.durationMs / 1000).toFixed(1)}s`, '');
  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
