import type { ChimeinConfigFileParsed } from './zod.js';

export type ChimeinConfigFile = ChimeinConfigFileParsed;

export type ModelRole = 'default' | 'fast';

export type ChimeinProvider =
  | { kind: 'anthropic' }
  | { kind: 'openai-compatible'; baseUrl?: string | undefined };

export interface ChimeinModelConfig {
  provider: ChimeinProvider;
  models: Record<ModelRole, string>;
}

export interface ImmersiveConfig {
  enabled: boolean;
  /** How long a user's next message counts as a follow-up after the agent replied. */
  ttlMs: number;
}

export interface ProactiveConfig {
  enabled: boolean;
  /** Quiet period after the agent speaks before it considers interjecting. */
  delayMs: number;
  bufferMaxLines: number;
  /** Start a fresh debounce window after a successful interjection. */
  rearmAfterInterjection: boolean;
}

export interface AttentionConfig {
  enabled: boolean;
  commandPrefixes: string[];
  decisionModel: ModelRole;
  immersive: ImmersiveConfig;
  proactive: ProactiveConfig;
}

export interface PersonaConfig {
  name: string;
  prompt: string;
}

export interface ChimeinConfig {
  schemaVersion: number;
  model: ChimeinModelConfig;
  attention: AttentionConfig;
  persona: PersonaConfig;
}
