import type {
  AttentionConfig,
  ChimeinConfig,
  ChimeinModelConfig,
  PersonaConfig,
} from './types.js';

const DEFAULT_SCHEMA_VERSION = 1;

export const DEFAULT_MODEL: ChimeinModelConfig = {
  provider: { kind: 'anthropic' },
  models: {
    default: 'claude-sonnet-4-5',
    fast: 'claude-haiku-4-5',
  },
};

export const DEFAULT_ATTENTION: AttentionConfig = {
  enabled: true,
  commandPrefixes: ['/'],
  decisionModel: 'default',
  immersive: {
    enabled: true,
    ttlMs: 120_000,
  },
  proactive: {
    enabled: true,
    delayMs: 8_000,
    bufferMaxLines: 20,
    rearmAfterInterjection: false,
  },
};

export const DEFAULT_PERSONA: PersonaConfig = {
  name: 'default',
  prompt: 'You are a friendly, concise member of this group chat.',
};

export const createDefaultConfig = (): ChimeinConfig => ({
  schemaVersion: DEFAULT_SCHEMA_VERSION,
  model: { provider: DEFAULT_MODEL.provider, models: { ...DEFAULT_MODEL.models } },
  attention: {
    ...DEFAULT_ATTENTION,
    commandPrefixes: [...DEFAULT_ATTENTION.commandPrefixes],
    immersive: { ...DEFAULT_ATTENTION.immersive },
    proactive: { ...DEFAULT_ATTENTION.proactive },
  },
  persona: { ...DEFAULT_PERSONA },
});
