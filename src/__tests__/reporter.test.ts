import { describe, expect, it } from 'vitest';

import { formatSummary, generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import type { RunSummary } from '../schema/index.js';

const summary: RunSummary = {
  targetUrl: 'https://10.0.0.5',
  host: '10.0.0.5',
  browser: 'chrome',
  startedAt: '2024-03-07T14:05:09.000Z',
  finishedAt: '2024-03-07T14:07:21.500Z',
  durationMs: 132_500,
  authenticated: true,
  finalState: 'Done',
  outcomes: [
    {
      action: 'configuration',
      success: true,
      archivedPath: '/srv/cfg/unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg',
      message: 'archived to /srv/cfg/unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg',
      durationMs: 61_000,
    },
    {
      action: 'keystore',
      success: false,
      failure: 'timeout',
      message: 'download timed out',
      durationMs: 750,
    },
  ],
};

describe('generateJSON', () => {
  it('maps the run onto the output contract', () => {
    const output = generateJSON(summary, 1);

    expect(output).toEqual({
      version: '1.0',
      result: 'FAIL',
      url: 'https://10.0.0.5',
      host: '10.0.0.5',
      browser: 'chrome',
      authenticated: true,
      finalState: 'Done',
      error: null,
      startedAt: '2024-03-07T14:05:09.000Z',
      durationMs: 132_500,
      exitCode: 1,
      actions: [
        {
          name: 'configuration',
          result: 'PASS',
          failure: null,
          archivedPath: '/srv/cfg/unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg',
          message: 'archived to /srv/cfg/unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg',
          durationMs: 61_000,
        },
        {
          name: 'keystore',
          result: 'FAIL',
          failure: 'timeout',
          archivedPath: null,
          message: 'download timed out',
          durationMs: 750,
        },
      ],
    });
  });

  it('passes only when every action succeeded', () => {
    const first = summary.outcomes[0];
    if (first === undefined) throw new Error('fixture has no outcomes');

    expect(generateJSON({ ...summary, outcomes: [first] }, 0).result).toBe('PASS');
    expect(generateJSON({ ...summary, outcomes: [] }, 1).result).toBe('FAIL');
  });
});

describe('serializeJSON', () => {
  it('sorts keys at every level', () => {
    const text = serializeJSON(generateJSON(summary, 1));
    const topKeys = Object.keys(JSON.parse(text));

    expect(topKeys).toEqual([...topKeys].sort());
    expect(text).toContain(
      '"archivedPath": null,\n      "durationMs": 750,\n      "failure": "timeout",',
    );
  });
});

describe('generateMarkdown', () => {
  it('renders a row per action', () => {
    const lines = generateMarkdown(summary).split('\n');

    expect(lines[0]).toBe('# Unisphere Backup Report');
    expect(lines).toContain('| **Duration** | 132.5s |');
    expect(lines).toContain('| **Result** | **FAIL** |');
    expect(lines).toContain('| keystore | FAIL | timeout | 750ms | download timed out |');
  });

  it('escapes pipes in the error cell', () => {
    const md = generateMarkdown({ ...summary, finalState: 'Failed', error: 'a | b\nc', outcomes: [] });

    expect(md).toContain('| **Error** | a \\| b c |');
    expect(md).toContain('_No action ran._');
  });
});

describe('formatSummary', () => {
  it('lists each action with its result', () => {
    expect(formatSummary(summary).split('\n')).toEqual([
      '',
      '--- Unisphere Backup Result ---',
      'URL:      https://10.0.0.5',
      'State:    Done',
      'Actions:  1 succeeded, 1 failed',
      '  ✅ configuration: archived to /srv/cfg/unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg',
      '  ❌ keystore: download timed out',
      'Time:     132.5s',
      '',
    ]);
  });
});
