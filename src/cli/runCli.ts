import { type LoadedChimeinConfig, loadChimeinConfig } from '../config/load.js';
import { isCommandName, parseCliArgs } from './args.js';
import { helpForCmd, renderUsage } from './usage.js';

const formatCliError = (message: string): string =>
  message.startsWith('chimein:') ? message : `chimein: ${message}`;

const ms = (value: number): string =>
  value % 1000 === 0 ? `${value / 1000}s` : `${value}ms`;

/** Human-readable summary for `chimein config`. */
export const formatConfigSummary = (loaded: LoadedChimeinConfig): string => {
  const { config } = loaded;
  const { attention } = config;
  const onOff = (enabled: boolean): string => (enabled ? 'on' : 'off');
  const provider = config.model.provider;
  return [
    `config:      ${loaded.configPath}`,
    `provider:    ${provider.kind}${provider.kind === 'openai-compatible' && provider.baseUrl ? ` (${provider.baseUrl})` : ''}`,
    `models:      default=${config.model.models.default} fast=${config.model.models.fast}`,
    `attention:   ${onOff(attention.enabled)} (decisions on ${attention.decisionModel} model)`,
    `follow-up:   ${onOff(attention.immersive.enabled)}, window ${ms(attention.immersive.ttlMs)}`,
    `interject:   ${onOff(attention.proactive.enabled)}, quiet ${ms(attention.proactive.delayMs)}, buffer ${attention.proactive.bufferMaxLines} lines${attention.proactive.rearmAfterInterjection ? ', re-arms' : ''}`,
    `commands:    ${attention.commandPrefixes.map((p) => JSON.stringify(p)).join(' ')}`,
    `persona:     ${config.persona.name}`,
  ].join('\n');
};

export async function runCli(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${formatCliError(msg)}\n`);
    process.exit(1);
  }

  const { cmd, opts } = parsed;
  if (!isCommandName(cmd)) {
    process.stderr.write(`chimein: unknown command "${cmd}"\n\n${renderUsage(opts.noColor)}\n`);
    process.exit(1);
  }

  if (opts.help) {
    const text = argv.includes(cmd) ? helpForCmd(cmd, opts.noColor) : renderUsage(opts.noColor);
    process.stdout.write(`${text}\n`);
    process.exit(0);
  }

  try {
    switch (cmd) {
      case 'start': {
        const { Harness } = await import('../harness/harness.js');
        const harness = await Harness.bootFromEnv({
          cwd: process.cwd(),
          configPath: opts.configPath,
        });
        await harness.startRuntime();
        return;
      }
      case 'config': {
        const loaded = await loadChimeinConfig({
          cwd: process.cwd(),
          env: process.env,
          ...(opts.configPath ? { configPath: opts.configPath } : {}),
        });
        const out = opts.json
          ? JSON.stringify({ configPath: loaded.configPath, config: loaded.config }, null, 2)
          : formatConfigSummary(loaded);
        process.stdout.write(`${out}\n`);
        return;
      }
    }
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${formatCliError(msg)}\n`);
    process.exit(1);
  }
}
