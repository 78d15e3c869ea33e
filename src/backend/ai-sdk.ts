import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { generateText, type LanguageModel, type ModelMessage } from 'ai';

import { isAbortLikeError } from '../attention/errors.js';
import type { ChimeinConfig, ModelRole } from '../config/types.js';
import { errorFields, log } from '../util/logger.js';
import type {
  HistoryTurn,
  TextChatProvider,
  TextChatRequest,
  TextChatResult,
} from './types.js';

interface ResolvedModel {
  role: ModelRole;
  id: string;
  model: LanguageModel;
}

export interface GenerateTextArgs {
  model: LanguageModel;
  system: string;
  messages: ModelMessage[];
  maxRetries: number;
  abortSignal?: AbortSignal;
}

export type GenerateTextFn = (args: GenerateTextArgs) => Promise<{ text: string }>;

export interface CreateAiSdkTextChatOptions {
  config: ChimeinConfig;
  env?: NodeJS.ProcessEnv | undefined;
  generateTextImpl?: GenerateTextFn | undefined;
}

interface ProviderEnv extends NodeJS.ProcessEnv {
  ANTHROPIC_API_KEY?: string;
  OPENROUTER_API_KEY?: string;
  OPENAI_API_KEY?: string;
}

const CIRCUIT_FAILURE_THRESHOLD = 5;
const CIRCUIT_OPEN_MS = 60_000;

const requireEnv = (env: NodeJS.ProcessEnv, key: string, hint: string): string => {
  const value = env[key];
  if (typeof value === 'string' && value.trim()) return value.trim();
  throw new Error(`Missing ${key}. ${hint}`);
};

const toModelMessages = (history: readonly HistoryTurn[], prompt: string): ModelMessage[] => [
  ...history.map(
    (turn): ModelMessage =>
      turn.role === 'assistant'
        ? { role: 'assistant', content: turn.content }
        : { role: 'user', content: turn.content },
  ),
  { role: 'user', content: prompt },
];

/**
 * Text-chat provider backed by the AI SDK. One instance serves both model
 * roles; `forRole` hands out a provider bound to one of them.
 */
export class AiSdkTextChat {
  private readonly logger = log.child({ component: 'ai_sdk_text_chat' });
  private readonly circuit = { failures: 0, openUntilMs: 0 };

  private constructor(
    private readonly models: Record<ModelRole, ResolvedModel>,
    private readonly generate: GenerateTextFn,
  ) {}

  public static create(options: CreateAiSdkTextChatOptions): AiSdkTextChat {
    const env: ProviderEnv = options.env ?? process.env;
    const generate: GenerateTextFn = options.generateTextImpl ?? ((args) => generateText(args));
    const { provider, models: ids } = options.config.model;

    if (provider.kind === 'anthropic') {
      const anthropic = createAnthropic({
        apiKey: requireEnv(env, 'ANTHROPIC_API_KEY', 'Set it in your environment.'),
      });
      const make = (role: ModelRole): ResolvedModel => ({
        role,
        id: ids[role],
        model: anthropic(ids[role]),
      });
      return new AiSdkTextChat({ default: make('default'), fast: make('fast') }, generate);
    }

    const baseURL = provider.baseUrl;
    if (!baseURL) {
      throw new Error('OpenAI-compatible provider requires model.base_url.');
    }
    const host = baseURL.toLowerCase();
    let apiKey: string | undefined;
    if (host.includes('openrouter.ai')) {
      apiKey = requireEnv(env, 'OPENROUTER_API_KEY', 'OpenRouter requires OPENROUTER_API_KEY.');
    } else if (host.includes('api.openai.com')) {
      apiKey = requireEnv(env, 'OPENAI_API_KEY', 'OpenAI requires OPENAI_API_KEY.');
    } else {
      apiKey = env.OPENAI_API_KEY?.trim() || undefined;
    }
    const compatible = createOpenAICompatible({
      name: 'openai-compatible',
      baseURL,
      ...(apiKey ? { apiKey } : {}),
    });
    const make = (role: ModelRole): ResolvedModel => ({
      role,
      id: ids[role],
      model: compatible.chatModel(ids[role]),
    });
    return new AiSdkTextChat({ default: make('default'), fast: make('fast') }, generate);
  }

  public forRole(role: ModelRole): TextChatProvider {
    return { textChat: (request) => this.complete(role, request) };
  }

  private pickModel(role: ModelRole): ResolvedModel {
    if (role === 'fast') return this.models.fast;
    if (this.circuit.openUntilMs > Date.now()) {
      this.logger.warn('circuit.fallback_to_fast', { openUntilMs: this.circuit.openUntilMs });
      return this.models.fast;
    }
    return this.models.default;
  }

  private async complete(role: ModelRole, request: TextChatRequest): Promise<TextChatResult> {
    const resolved = this.pickModel(role);
    try {
      const result = await this.generate({
        model: resolved.model,
        system: request.systemPrompt,
        messages: toModelMessages(request.history, request.prompt),
        maxRetries: 0,
        ...(request.signal ? { abortSignal: request.signal } : {}),
      });
      this.circuit.failures = 0;
      this.circuit.openUntilMs = 0;
      return { role: 'assistant', completionText: result.text.trim(), modelId: resolved.id };
    } catch (err) {
      if (isAbortLikeError(err)) {
        this.logger.debug('complete.aborted', { role, model: resolved.id });
        throw err;
      }
      this.circuit.failures += 1;
      this.logger.error('complete.failed', {
        role,
        model: resolved.id,
        failures: this.circuit.failures,
        ...errorFields(err),
      });
      if (this.circuit.failures >= CIRCUIT_FAILURE_THRESHOLD) {
        this.circuit.openUntilMs = Date.now() + CIRCUIT_OPEN_MS;
        this.logger.warn('circuit.open', { openUntilMs: this.circuit.openUntilMs });
      }
      throw err;
    }
  }
}
