import { describe, expect, test } from 'vitest';

import { helpForCmd, renderUsage } from './usage.js';

describe('cli usage', () => {
  test('lists every command', () => {
    const lines = renderUsage(true).split('\n');
    expect(lines).toContain('  start                 Run the Telegram bot default');
    expect(lines).toContain('  config                Print the resolved configuration --json');
  });

  test('strips colors on request', () => {
    expect(renderUsage(true)).not.toMatch(/\u001b\[/u);
  });

  test('has per-command help', () => {
    expect(helpForCmd('config', true).split('\n')).toEqual([
      'chimein config',
      '',
      '  --json                JSON output',
      '  --config PATH         Use a specific chimein.toml',
    ]);
  });
});
