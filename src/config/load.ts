import { parse as parseToml } from 'smol-toml';

import { findUp, readTextFile } from '../util/fs.js';
import { createDefaultConfig } from './defaults.js';
import {
  assertIntInRange,
  assertModelName,
  type ChimeinEnv,
  nonEmptyTrimmed,
  parseBoolEnvStrict,
  parseCsvEnv,
  parseIntEnv,
  resolveProvider,
} from './env.js';
import type { ChimeinConfig } from './types.js';
import { ChimeinConfigFileSchema } from './zod.js';

export const CONFIG_FILENAME = 'chimein.toml';

export interface LoadChimeinConfigOptions {
  cwd?: string | undefined;
  configPath?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

export interface LoadedChimeinConfig {
  configPath: string;
  config: ChimeinConfig;
}

const MAX_COMMAND_PREFIXES = 16;

export const assertAttentionBounds = (config: ChimeinConfig): void => {
  const { attention } = config;
  assertIntInRange('attention.immersive.ttl_ms', attention.immersive.ttlMs, 1_000, 3_600_000);
  assertIntInRange('attention.proactive.delay_ms', attention.proactive.delayMs, 250, 600_000);
  assertIntInRange(
    'attention.proactive.buffer_max_lines',
    attention.proactive.bufferMaxLines,
    1,
    200,
  );
  const prefixes = attention.commandPrefixes;
  if (prefixes.length < 1 || prefixes.length > MAX_COMMAND_PREFIXES) {
    throw new Error(`attention.command_prefixes must hold 1 to ${MAX_COMMAND_PREFIXES} entries`);
  }
  if (prefixes.some((p) => p.trim().length === 0)) {
    throw new Error('attention.command_prefixes entries must be non-empty');
  }
};

export const loadChimeinConfig = async (
  options: LoadChimeinConfigOptions = {},
): Promise<LoadedChimeinConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env: ChimeinEnv = options.env ?? process.env;

  const configPath =
    options.configPath ?? env.CHIMEIN_CONFIG_PATH ?? (await findUp(CONFIG_FILENAME, cwd));
  if (!configPath) {
    throw new Error(
      `Could not find ${CONFIG_FILENAME} (set CHIMEIN_CONFIG_PATH or pass --config to override).`,
    );
  }

  const defaults = createDefaultConfig();
  const tomlText = await readTextFile(configPath);
  let tomlUnknown: unknown;
  try {
    tomlUnknown = parseToml(tomlText);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Malformed ${CONFIG_FILENAME} (${configPath}): ${msg}`);
  }
  const parsed = ChimeinConfigFileSchema.safeParse(tomlUnknown);
  if (!parsed.success) {
    throw new Error(`Invalid ${CONFIG_FILENAME}: ${parsed.error.message}`);
  }
  const file = parsed.data;
  const attention = file.attention;

  const provider = resolveProvider(
    env.CHIMEIN_MODEL_PROVIDER ?? file.model?.provider,
    env.CHIMEIN_MODEL_BASE_URL ?? file.model?.base_url,
  );
  const modelDefault =
    nonEmptyTrimmed(env.CHIMEIN_MODEL_DEFAULT) ??
    nonEmptyTrimmed(file.model?.default) ??
    defaults.model.models.default;
  const modelFast =
    nonEmptyTrimmed(env.CHIMEIN_MODEL_FAST) ?? nonEmptyTrimmed(file.model?.fast) ?? modelDefault;
  assertModelName('model.default', modelDefault);
  assertModelName('model.fast', modelFast);

  const config: ChimeinConfig = {
    schemaVersion: file.schema_version ?? defaults.schemaVersion,
    model: {
      provider,
      models: { default: modelDefault, fast: modelFast },
    },
    attention: {
      enabled:
        parseBoolEnvStrict(env.CHIMEIN_ATTENTION_ENABLED, 'CHIMEIN_ATTENTION_ENABLED') ??
        attention?.enabled ??
        defaults.attention.enabled,
      commandPrefixes:
        parseCsvEnv(env.CHIMEIN_COMMAND_PREFIXES, 'CHIMEIN_COMMAND_PREFIXES') ??
        attention?.command_prefixes ??
        defaults.attention.commandPrefixes,
      decisionModel: attention?.decision_model ?? defaults.attention.decisionModel,
      immersive: {
        enabled:
          parseBoolEnvStrict(env.CHIMEIN_IMMERSIVE_ENABLED, 'CHIMEIN_IMMERSIVE_ENABLED') ??
          attention?.immersive?.enabled ??
          defaults.attention.immersive.enabled,
        ttlMs:
          parseIntEnv(env.CHIMEIN_IMMERSIVE_TTL_MS, 'CHIMEIN_IMMERSIVE_TTL_MS') ??
          attention?.immersive?.ttl_ms ??
          defaults.attention.immersive.ttlMs,
      },
      proactive: {
        enabled:
          parseBoolEnvStrict(env.CHIMEIN_PROACTIVE_ENABLED, 'CHIMEIN_PROACTIVE_ENABLED') ??
          attention?.proactive?.enabled ??
          defaults.attention.proactive.enabled,
        delayMs:
          parseIntEnv(env.CHIMEIN_PROACTIVE_DELAY_MS, 'CHIMEIN_PROACTIVE_DELAY_MS') ??
          attention?.proactive?.delay_ms ??
          defaults.attention.proactive.delayMs,
        bufferMaxLines:
          attention?.proactive?.buffer_max_lines ?? defaults.attention.proactive.bufferMaxLines,
        rearmAfterInterjection:
          parseBoolEnvStrict(env.CHIMEIN_PROACTIVE_REARM, 'CHIMEIN_PROACTIVE_REARM') ??
          attention?.proactive?.rearm_after_interjection ??
          defaults.attention.proactive.rearmAfterInterjection,
      },
    },
    persona: {
      name: nonEmptyTrimmed(file.persona?.name) ?? defaults.persona.name,
      prompt: file.persona?.prompt ?? defaults.persona.prompt,
    },
  };

  assertAttentionBounds(config);
  return { configPath, config };
};
