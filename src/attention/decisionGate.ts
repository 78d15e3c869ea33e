import { z } from 'zod';

import type { HistoryTurn, TextChatProviderSource, TextChatResult } from '../backend/types.js';
import { PerKeyLock } from '../util/lock.js';
import { errorFields, type Logger, log } from '../util/logger.js';
import { DecisionParseError, isAbortLikeError, UpstreamUnavailableError } from './errors.js';
import { extractJsonObject } from './json.js';

export type DecisionMode = 'follow_up' | 'interjection';

export type PassReason =
  | 'declined'
  | 'empty_content'
  | 'parse_error'
  | 'upstream_unavailable'
  | 'upstream_failed'
  | 'non_assistant'
  | 'aborted'
  | 'delivery_failed';

export type DecisionVerdict =
  | { kind: 'reply'; content: string }
  | { kind: 'pass'; reason: PassReason };

export interface Decision {
  shouldReply: boolean;
  content: string;
}

export interface DecisionRequest {
  readonly mode: DecisionMode;
  /** Calls sharing a mode and key never overlap. */
  readonly key: string;
  readonly prompt: string;
  readonly history: readonly HistoryTurn[];
  readonly systemPrompt: string;
  readonly signal?: AbortSignal | undefined;
}

export interface DecisionGateOptions {
  readonly providers: TextChatProviderSource;
  readonly logger?: Logger | undefined;
}

const DecisionSchema = z
  .object({
    should_reply: z.boolean().optional(),
    shouldReply: z.boolean().optional(),
    reply_content: z.string().nullable().optional(),
    content: z.string().nullable().optional(),
  })
  .refine((d) => d.should_reply !== undefined || d.shouldReply !== undefined, {
    message: 'should_reply is required',
  });

export const parseDecision = (text: string): Decision => {
  const raw = extractJsonObject(text);
  const parsed = DecisionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecisionParseError(`Invalid decision object: ${parsed.error.message}`, text);
  }
  const d = parsed.data;
  return {
    shouldReply: d.should_reply ?? d.shouldReply ?? false,
    content: (d.reply_content ?? d.content ?? '').trim(),
  };
};

const PREVIEW_CHARS = 200;

/**
 * Runs one decision call per firing or follow-up and delivers the reply when
 * the model accepts. Failures never escape: every outcome is a verdict.
 */
export class DecisionGate {
  private readonly lock = new PerKeyLock<string>();
  private readonly logger: Logger;

  constructor(private readonly options: DecisionGateOptions) {
    this.logger = options.logger ?? log.child({ component: 'decision_gate' });
  }

  public async run(
    request: DecisionRequest,
    deliver: (content: string) => Promise<void>,
  ): Promise<DecisionVerdict> {
    const lockKey = `${request.mode}:${request.key}`;
    return this.lock.runExclusive(lockKey, async (): Promise<DecisionVerdict> => {
      const verdict = await this.decide(request);
      if (verdict.kind !== 'reply') {
        this.logger.info('decision.pass', {
          mode: request.mode,
          key: request.key,
          reason: verdict.reason,
        });
        return verdict;
      }
      try {
        await deliver(verdict.content);
      } catch (err) {
        this.logger.error('decision.deliver_failed', {
          mode: request.mode,
          key: request.key,
          ...errorFields(err),
        });
        return { kind: 'pass', reason: 'delivery_failed' };
      }
      this.logger.info('decision.replied', {
        mode: request.mode,
        key: request.key,
        chars: verdict.content.length,
      });
      return verdict;
    });
  }

  private async decide(request: DecisionRequest): Promise<DecisionVerdict> {
    const { mode, key, signal } = request;
    if (signal?.aborted) return { kind: 'pass', reason: 'aborted' };

    const provider = this.options.providers();
    if (!provider) {
      this.logger.warn('decision.upstream_unavailable', {
        mode,
        key,
        ...errorFields(new UpstreamUnavailableError()),
      });
      return { kind: 'pass', reason: 'upstream_unavailable' };
    }

    let completion: TextChatResult;
    try {
      completion = await provider.textChat({
        prompt: request.prompt,
        history: request.history,
        systemPrompt: request.systemPrompt,
        signal,
      });
    } catch (err) {
      if (signal?.aborted || isAbortLikeError(err)) return { kind: 'pass', reason: 'aborted' };
      this.logger.error('decision.upstream_failed', { mode, key, ...errorFields(err) });
      return { kind: 'pass', reason: 'upstream_failed' };
    }

    if (completion.role !== 'assistant') {
      this.logger.warn('decision.non_assistant', { mode, key, role: completion.role });
      return { kind: 'pass', reason: 'non_assistant' };
    }

    let decision: Decision;
    try {
      decision = parseDecision(completion.completionText);
    } catch (err) {
      if (!(err instanceof DecisionParseError)) throw err;
      this.logger.warn('decision.parse_failed', {
        mode,
        key,
        rawPreview: err.rawText.slice(0, PREVIEW_CHARS),
        ...errorFields(err),
      });
      return { kind: 'pass', reason: 'parse_error' };
    }

    if (!decision.shouldReply) return { kind: 'pass', reason: 'declined' };
    if (!decision.content) return { kind: 'pass', reason: 'empty_content' };
    return { kind: 'reply', content: decision.content };
  }
}
