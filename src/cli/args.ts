export type GlobalOpts = {
  help: boolean;
  json: boolean;
  noColor: boolean;
  configPath?: string | undefined;
};

export const KNOWN_COMMANDS = ['start', 'config'] as const;

export type CommandName = (typeof KNOWN_COMMANDS)[number];

export const isCommandName = (value: string): value is CommandName =>
  KNOWN_COMMANDS.some((c) => c === value);

export const parseCliArgs = (
  argv: readonly string[],
): { cmd: string; cmdArgs: string[]; opts: GlobalOpts } => {
  const remaining: string[] = [];
  const opts: GlobalOpts = {
    help: false,
    json: false,
    noColor: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (!a) continue;
    if (a === '--help' || a === '-h') {
      opts.help = true;
      continue;
    }
    if (a === '--json') {
      opts.json = true;
      continue;
    }
    if (a === '--no-color') {
      opts.noColor = true;
      continue;
    }
    if (a === '--config') {
      const next = argv[i + 1];
      if (!next || next.startsWith('-')) throw new Error('--config requires a path');
      const value = next.trim();
      if (!value) throw new Error('--config requires a path');
      opts.configPath = value;
      i += 1;
      continue;
    }
    if (a.startsWith('--config=')) {
      const value = a.slice('--config='.length).trim();
      if (!value) throw new Error('--config requires a path');
      opts.configPath = value;
      continue;
    }
    if (a === '--') {
      remaining.push(...argv.slice(i + 1));
      break;
    }
    if (a.startsWith('-')) {
      throw new Error(`unknown option "${a}". Run chimein --help for usage.`);
    }
    remaining.push(a);
  }

  const cmd = remaining[0] ?? 'start';
  const cmdArgs = remaining.slice(1);
  if (cmdArgs.length > 0) {
    throw new Error(`unexpected argument "${cmdArgs[0]}". Run chimein ${cmd} --help for usage.`);
  }
  return { cmd, cmdArgs, opts };
};
