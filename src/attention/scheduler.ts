import type { HistoryTurn } from '../backend/types.js';
import type { AttentionConfig } from '../config/types.js';
import type {
  ChatEvent,
  ConversationSnapshot,
  ConversationSource,
  Outbound,
  SystemPromptResolver,
} from '../host/types.js';
import type { GroupId, UserId } from '../types/ids.js';
import { errorFields, type Logger, log, newCorrelationId, withLogContext } from '../util/logger.js';
import { formatChatLine } from './chatBuffer.js';
import type { DecisionGate } from './decisionGate.js';
import { ImmersiveSessionTable, sessionKey } from './immersiveSessions.js';
import { ProactiveTimerTable } from './proactiveTimers.js';
import { buildFollowUpPrompt, buildInterjectionPrompt } from './prompts.js';

export type MessageDisposition = 'ignored' | 'command' | 'follow_up' | 'buffered';

export interface ReplySentEvent {
  groupId: GroupId;
  userId: UserId;
  origin: string;
  context: ConversationSnapshot;
}

export interface AttentionSchedulerOptions {
  readonly config: AttentionConfig;
  readonly gate: DecisionGate;
  readonly prompts: SystemPromptResolver;
  readonly history: Pick<ConversationSource, 'appendExchange'>;
  readonly outbound: Outbound;
  readonly logger?: Logger | undefined;
}

export interface AttentionStats {
  sessions: number;
  timers: number;
  inFlight: number;
}

/**
 * Decides when the agent speaks without being addressed. Reply-sent events arm
 * a per-user follow-up session and restart the group's debounce timer; incoming
 * messages either consume the session, land in the timer's buffer, or are
 * ignored. No table state is held across a decision call.
 */
export class AttentionScheduler {
  private readonly logger: Logger;
  private readonly sessions: ImmersiveSessionTable<ConversationSnapshot>;
  private readonly timers: ProactiveTimerTable;
  private readonly controller = new AbortController();
  private readonly inflight = new Set<Promise<void>>();
  private stopped = false;

  constructor(private readonly options: AttentionSchedulerOptions) {
    this.logger = options.logger ?? log.child({ component: 'scheduler' });
    this.sessions = new ImmersiveSessionTable<ConversationSnapshot>({
      onExpire: (groupId, userId) => {
        this.logger.debug('follow_up.window_closed', { groupId, userId });
      },
    });
    this.timers = new ProactiveTimerTable({
      bufferMaxLines: options.config.proactive.bufferMaxLines,
    });
  }

  private get config(): AttentionConfig {
    return this.options.config;
  }

  public stats(): AttentionStats {
    return {
      sessions: this.sessions.size,
      timers: this.timers.size,
      inFlight: this.inflight.size,
    };
  }

  public hasSession(groupId: GroupId, userId: UserId): boolean {
    return this.sessions.has(groupId, userId);
  }

  public isTimerRunning(groupId: GroupId): boolean {
    return this.timers.isRunning(groupId);
  }

  public onReplySent(event: ReplySentEvent): void {
    if (this.stopped || !this.config.enabled) return;
    const { groupId, userId, origin } = event;

    if (this.config.immersive.enabled) {
      try {
        this.sessions.arm(groupId, userId, event.context, this.config.immersive.ttlMs);
      } catch (err) {
        this.logger.error('session.arm_failed', { groupId, userId, ...errorFields(err) });
      }
    }

    if (this.config.proactive.enabled) {
      try {
        this.armTimer(groupId, origin);
      } catch (err) {
        this.logger.error('timer.arm_failed', { groupId, ...errorFields(err) });
      }
    }
  }

  public async onMessage(event: ChatEvent): Promise<MessageDisposition> {
    const { groupId, senderId } = event;
    if (this.stopped || !this.config.enabled) return 'ignored';
    if (event.isPrivate || groupId === undefined) return 'ignored';
    if (senderId === event.selfId) return 'ignored';

    if (this.isCommand(event.text)) {
      const invalidated = this.sessions.invalidate(groupId, senderId);
      this.logger.debug('message.command', { groupId, userId: senderId, invalidated });
      return 'command';
    }

    // Consumption must happen before any await so two racing messages see one winner.
    const snapshot = this.config.immersive.enabled
      ? this.sessions.tryConsume(groupId, senderId)
      : undefined;
    if (snapshot) {
      this.timers.cancel(groupId);
      // The decision runs in the background so other chats keep flowing; idle() waits for it.
      this.track(this.runFollowUp(event, groupId, snapshot));
      return 'follow_up';
    }

    if (this.config.proactive.enabled) {
      if (this.timers.tryAppend(groupId, formatChatLine(event.senderName, event.text))) {
        return 'buffered';
      }
    }
    return 'ignored';
  }

  /**
   * The host is answering this message itself, so the sender's pending
   * follow-up is dropped. Returns false for commands, which the host's command
   * handlers own.
   */
  public yieldToHost(event: ChatEvent): boolean {
    if (this.stopped || !this.config.enabled) return true;
    const command = this.isCommand(event.text);
    if (event.groupId !== undefined) {
      const invalidated = this.sessions.invalidate(event.groupId, event.senderId);
      this.logger.debug('message.yielded', {
        groupId: event.groupId,
        userId: event.senderId,
        command,
        invalidated,
      });
    }
    return !command;
  }

  /** Handles a proactive timer firing. Stale tokens are a no-op. */
  public async onTimerFire(groupId: GroupId, token: number, origin: string): Promise<void> {
    const lines = this.timers.drainIfCurrent(groupId, token);
    if (lines === undefined) {
      this.logger.debug('timer.stale', { groupId, token });
      return;
    }
    if (lines.length === 0) {
      this.logger.info('timer.quiet', { groupId, token });
      return;
    }
    if (this.stopped) return;
    const work = this.runInterjection(groupId, token, origin, lines);
    this.track(work);
    await work;
  }

  /** Waits for every decision currently in flight. */
  public async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  public async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.sessions.clear();
    this.timers.cancelAll();
    this.controller.abort('shutdown');
    await this.idle();
    this.logger.info('scheduler.stopped');
  }

  private isCommand(text: string): boolean {
    const trimmed = text.trimStart();
    return this.config.commandPrefixes.some((prefix) => trimmed.startsWith(prefix));
  }

  private armTimer(groupId: GroupId, origin: string): void {
    this.timers.restart(groupId, this.config.proactive.delayMs, (g, token) =>
      this.onTimerFire(g, token, origin),
    );
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((err: unknown) => {
        this.logger.error('work.failed', errorFields(err));
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }

  private async runFollowUp(
    event: ChatEvent,
    groupId: GroupId,
    snapshot: ConversationSnapshot,
  ): Promise<void> {
    const userId = event.senderId;
    await withLogContext({ correlationId: newCorrelationId(), groupId, userId }, async () => {
      try {
        const systemPrompt = await this.options.prompts.resolveSystemPrompt(event.origin);
        const verdict = await this.options.gate.run(
          {
            mode: 'follow_up',
            key: sessionKey(groupId, userId),
            prompt: buildFollowUpPrompt({ senderName: event.senderName, text: event.text }),
            history: snapshot.history,
            systemPrompt,
            signal: this.controller.signal,
          },
          async (content) => {
            await this.options.outbound.emitPlainReply(event, content);
            await this.appendHistory(event.origin, snapshot.conversationId, [
              { role: 'user', content: event.text },
              { role: 'assistant', content },
            ]);
          },
        );
        this.logger.info('follow_up.done', {
          verdict: verdict.kind,
          ...(verdict.kind === 'pass' ? { reason: verdict.reason } : {}),
        });
      } catch (err) {
        this.logger.error('follow_up.failed', errorFields(err));
      }
    });
  }

  private async runInterjection(
    groupId: GroupId,
    token: number,
    origin: string,
    lines: readonly string[],
  ): Promise<void> {
    await withLogContext({ correlationId: newCorrelationId(), groupId, token }, async () => {
      try {
        const systemPrompt = await this.options.prompts.resolveSystemPrompt(origin);
        const verdict = await this.options.gate.run(
          {
            mode: 'interjection',
            key: groupId,
            prompt: buildInterjectionPrompt(lines),
            history: [],
            systemPrompt,
            signal: this.controller.signal,
          },
          (content) => this.options.outbound.sendMessage(origin, content),
        );
        this.logger.info('interjection.done', {
          lines: lines.length,
          verdict: verdict.kind,
          ...(verdict.kind === 'pass' ? { reason: verdict.reason } : {}),
        });
        // A newer reply may already have restarted the timer; leave that one alone.
        if (
          verdict.kind === 'reply' &&
          this.config.proactive.rearmAfterInterjection &&
          !this.stopped &&
          !this.timers.isRunning(groupId)
        ) {
          this.armTimer(groupId, origin);
        }
      } catch (err) {
        this.logger.error('interjection.failed', errorFields(err));
      }
    });
  }

  // The reply already went out; a history write failure only costs future context.
  private async appendHistory(
    origin: string,
    conversationId: string | undefined,
    turns: readonly HistoryTurn[],
  ): Promise<void> {
    try {
      await this.options.history.appendExchange(origin, conversationId, turns);
    } catch (err) {
      this.logger.error('history.append_failed', { origin, ...errorFields(err) });
    }
  }
}
