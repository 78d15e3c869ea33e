import { stripVTControlCharacters } from 'node:util';
import gradient from 'gradient-string';
import pc from 'picocolors';

import type { CommandName } from './args.js';

const brand = gradient(['#f59e0b', '#ef4444', '#ec4899']);

const cmd = (name: string, desc: string, hint?: string): string => {
  const h = hint ? pc.dim(` ${hint}`) : '';
  return `  ${pc.bold(pc.cyan(name))}${' '.repeat(Math.max(1, 22 - name.length))}${desc}${h}`;
};

const opt = (flag: string, desc: string): string =>
  `  ${pc.yellow(flag)}${' '.repeat(Math.max(1, 22 - flag.length))}${pc.dim(desc)}`;

const section = (title: string): string => `\n${pc.bold(title)}`;

const USAGE: string = [
  '',
  `  ${brand('chimein')} ${pc.dim('- follow-ups and well-timed interjections for group chats')}`,
  '',
  section('Commands'),
  cmd('start', 'Run the Telegram bot', 'default'),
  cmd('config', 'Print the resolved configuration', '--json'),
  '',
  section('Global options'),
  opt('--config <path>', 'Use a specific chimein.toml'),
  opt('--json', 'JSON output (config)'),
  opt('--no-color', 'Disable ANSI colors'),
  opt('--help, -h', 'Show help'),
  '',
  section('Environment'),
  opt('TELEGRAM_BOT_TOKEN', 'Bot token from @BotFather (start)'),
  opt('ANTHROPIC_API_KEY', 'Anthropic provider key'),
  opt('OPENROUTER_API_KEY', 'OpenRouter provider key'),
  opt('CHIMEIN_LOG_LEVEL', 'debug | info | warn | error | fatal'),
  '',
].join('\n');

const HELP_BY_CMD: Readonly<Record<CommandName, string>> = {
  start: [
    `${pc.bold('chimein start')}`,
    '',
    '  Connects to Telegram and answers mentions. After each reply the bot',
    '  listens for a follow-up from the same person and, once the group goes',
    '  quiet, decides whether to chime in on what was said.',
    '',
    opt('--config PATH', 'Use a specific chimein.toml'),
  ].join('\n'),

  config: [
    `${pc.bold('chimein config')}`,
    '',
    opt('--json', 'JSON output'),
    opt('--config PATH', 'Use a specific chimein.toml'),
  ].join('\n'),
};

const maybeStripColor = (value: string, noColor: boolean): string => {
  if (!noColor) return value;
  return stripVTControlCharacters(value);
};

export const renderUsage = (noColor = false): string => maybeStripColor(USAGE, noColor);

export const helpForCmd = (command: CommandName, noColor = false): string =>
  maybeStripColor(HELP_BY_CMD[command], noColor);
