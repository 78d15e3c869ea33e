import type { Bot } from 'grammy';

import type { AttentionScheduler } from '../attention/scheduler.js';
import type { HistoryTurn, TextChatProviderSource } from '../backend/types.js';
import type { ContextResolver } from '../host/context.js';
import type { ChatEvent, ConversationSource, Outbound } from '../host/types.js';
import { asGroupId, asUserId } from '../types/ids.js';
import { PerKeyLock } from '../util/lock.js';
import { errorFields, type Logger, log, newCorrelationId, withLogContext } from '../util/logger.js';

export interface TelegramConfig {
  token: string;
}

interface TelegramEnv extends NodeJS.ProcessEnv {
  TELEGRAM_BOT_TOKEN?: string;
}

export const resolveTelegramConfig = (env: TelegramEnv): TelegramConfig => {
  const token = env.TELEGRAM_BOT_TOKEN?.trim();
  if (!token) throw new Error('Telegram adapter requires TELEGRAM_BOT_TOKEN.');
  return { token };
};

export interface TelegramEntity {
  type?: string | undefined;
  offset?: number | undefined;
  length?: number | undefined;
}

/** The slice of a grammy text-message context the adapter reads. */
export interface TelegramInbound {
  chat: { id: number; type: string };
  from?: { id: number; first_name?: string | undefined; last_name?: string | undefined } | undefined;
  me: { id: number; username: string };
  message: {
    message_id: number;
    date: number;
    text?: string | undefined;
    entities?: TelegramEntity[] | undefined;
    reply_to_message?: { from?: { id?: number | undefined } | undefined } | undefined;
  };
}

export const isGroupChat = (type: string): boolean => type === 'group' || type === 'supergroup';

export const telegramOrigin = (chat: { id: number; type: string }): string =>
  `telegram:${isGroupChat(chat.type) ? 'group' : 'private'}:${chat.id}`;

const ORIGIN_RE = /^telegram:(?:group|private):(-?\d+)$/u;

export const parseTelegramOrigin = (origin: string): number | undefined => {
  const match = ORIGIN_RE.exec(origin);
  if (!match?.[1]) return undefined;
  const chatId = Number(match[1]);
  return Number.isSafeInteger(chatId) ? chatId : undefined;
};

export const extractMentioned = (opts: {
  text: string;
  entities: readonly TelegramEntity[] | undefined;
  botUsername: string;
}): boolean => {
  if (!opts.text) return false;
  return (
    opts.entities?.some((e) => {
      if (e.type !== 'mention') return false;
      const offset = typeof e.offset === 'number' ? e.offset : -1;
      const length = typeof e.length === 'number' ? e.length : -1;
      if (offset < 0 || length <= 0) return false;
      return opts.text.slice(offset, offset + length) === `@${opts.botUsername}`;
    }) ?? false
  );
};

/** Private chats always count; in groups only a mention or a reply to the bot does. */
export const isAddressedToBot = (inbound: TelegramInbound): boolean => {
  if (!isGroupChat(inbound.chat.type)) return true;
  if (inbound.message.reply_to_message?.from?.id === inbound.me.id) return true;
  return extractMentioned({
    text: inbound.message.text ?? '',
    entities: inbound.message.entities,
    botUsername: inbound.me.username,
  });
};

export const toChatEvent = (inbound: TelegramInbound): ChatEvent | undefined => {
  const text = (inbound.message.text ?? '').trim();
  if (!text || !inbound.from) return undefined;
  const isGroup = isGroupChat(inbound.chat.type);
  const senderName = [inbound.from.first_name, inbound.from.last_name]
    .filter((s): s is string => typeof s === 'string' && s.trim().length > 0)
    .join(' ')
    .trim();
  return {
    channel: 'telegram',
    origin: telegramOrigin(inbound.chat),
    ...(isGroup ? { groupId: asGroupId(`tg:${inbound.chat.id}`) } : {}),
    senderId: asUserId(`tg:${inbound.from.id}`),
    selfId: asUserId(`tg:${inbound.me.id}`),
    senderName,
    text,
    isPrivate: !isGroup,
    timestampMs: inbound.message.date * 1000,
  };
};

export interface TelegramSendApi {
  sendMessage(chatId: number, text: string): Promise<unknown>;
}

export type PlainReplyListener = (event: ChatEvent, content: string) => Promise<void>;

/**
 * Sends through the Bot API. Everything going into one chat, including the
 * reply-sent notification that follows a reply, runs under that chat's lock.
 */
export class TelegramOutbound implements Outbound {
  private readonly lock = new PerKeyLock<string>();
  private readonly logger: Logger;
  private listener: PlainReplyListener | undefined;

  constructor(
    private readonly api: TelegramSendApi,
    logger?: Logger | undefined,
  ) {
    this.logger = logger ?? log.child({ component: 'telegram_outbound' });
  }

  public onPlainReply(listener: PlainReplyListener): void {
    this.listener = listener;
  }

  public async sendMessage(origin: string, content: string): Promise<void> {
    await this.lock.runExclusive(origin, () => this.send(origin, content));
  }

  public async emitPlainReply(event: ChatEvent, content: string): Promise<void> {
    await this.lock.runExclusive(event.origin, async () => {
      await this.send(event.origin, content);
      if (!this.listener) return;
      try {
        await this.listener(event, content);
      } catch (err) {
        this.logger.error('reply.listener_failed', { origin: event.origin, ...errorFields(err) });
      }
    });
  }

  private async send(origin: string, content: string): Promise<void> {
    const chatId = parseTelegramOrigin(origin);
    if (chatId === undefined) throw new Error(`Not a Telegram origin: ${origin}`);
    await this.api.sendMessage(chatId, content);
    this.logger.debug('message.sent', { origin, chars: content.length });
  }
}

/**
 * Tells the scheduler the agent just answered someone in a group. The captured
 * history does not have the new exchange yet, so it is appended here.
 */
export const createReplyNotifier =
  (deps: {
    context: Pick<ContextResolver, 'capture'>;
    scheduler: Pick<AttentionScheduler, 'onReplySent'>;
  }): PlainReplyListener =>
  async (event, content) => {
    if (event.groupId === undefined) return;
    const snapshot = await deps.context.capture(event.origin);
    deps.scheduler.onReplySent({
      groupId: event.groupId,
      userId: event.senderId,
      origin: event.origin,
      context: {
        ...(snapshot.conversationId !== undefined
          ? { conversationId: snapshot.conversationId }
          : {}),
        history: [
          ...snapshot.history,
          { role: 'user', content: event.text },
          { role: 'assistant', content },
        ],
      },
    });
  };

export interface TelegramRuntimeDeps {
  readonly scheduler: Pick<AttentionScheduler, 'onMessage' | 'yieldToHost'>;
  readonly outbound: Outbound;
  readonly context: Pick<ContextResolver, 'capture' | 'resolveSystemPrompt'>;
  readonly history: Pick<ConversationSource, 'appendExchange'>;
  readonly providers: TextChatProviderSource;
  readonly signal?: AbortSignal | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Routes one text message. A message addressed to the bot always gets a host
 * reply, and any follow-up the sender had pending is dropped. Everything else
 * goes to the scheduler.
 */
export const handleTelegramText = async (
  deps: TelegramRuntimeDeps,
  inbound: TelegramInbound,
): Promise<void> => {
  const logger = deps.logger ?? log.child({ component: 'telegram' });
  if (deps.signal?.aborted) return;
  const event = toChatEvent(inbound);
  if (!event) return;

  if (!isAddressedToBot(inbound)) {
    await deps.scheduler.onMessage(event);
    return;
  }
  if (!deps.scheduler.yieldToHost(event)) return;

  await withLogContext({ correlationId: newCorrelationId(), origin: event.origin }, async () => {
    const provider = deps.providers();
    if (!provider) {
      logger.warn('reply.no_provider', { origin: event.origin });
      return;
    }
    const [systemPrompt, snapshot] = await Promise.all([
      deps.context.resolveSystemPrompt(event.origin),
      deps.context.capture(event.origin),
    ]);
    const result = await provider.textChat({
      prompt: event.text,
      history: snapshot.history,
      systemPrompt,
      signal: deps.signal,
    });
    const content = result.completionText.trim();
    if (result.role !== 'assistant' || !content) {
      logger.warn('reply.empty', { origin: event.origin, role: result.role });
      return;
    }

    await deps.outbound.emitPlainReply(event, content);
    const turns: HistoryTurn[] = [
      { role: 'user', content: event.text },
      { role: 'assistant', content },
    ];
    try {
      await deps.history.appendExchange(event.origin, snapshot.conversationId, turns);
    } catch (err) {
      logger.error('history.append_failed', { origin: event.origin, ...errorFields(err) });
    }
    logger.info('reply.sent', { origin: event.origin });
  });
};

export interface RunTelegramAdapterOptions extends TelegramRuntimeDeps {
  readonly bot: Bot;
}

export const runTelegramAdapter = async (options: RunTelegramAdapterOptions): Promise<void> => {
  const { bot, signal } = options;
  const logger = options.logger ?? log.child({ component: 'telegram' });

  if (signal?.aborted) return;
  signal?.addEventListener(
    'abort',
    () => {
      if (!bot.isRunning()) return;
      bot.stop().catch((err: unknown) => {
        logger.error('stop_failed', errorFields(err));
      });
    },
    { once: true },
  );

  bot.on('message:text', async (ctx) => {
    const { message } = ctx;
    try {
      await handleTelegramText(options, {
        chat: { id: ctx.chat.id, type: ctx.chat.type },
        from: ctx.from
          ? { id: ctx.from.id, first_name: ctx.from.first_name, last_name: ctx.from.last_name }
          : undefined,
        me: { id: ctx.me.id, username: ctx.me.username },
        message: {
          message_id: message.message_id,
          date: message.date,
          text: message.text,
          entities: message.entities,
          reply_to_message: message.reply_to_message
            ? { from: message.reply_to_message.from }
            : undefined,
        },
      });
    } catch (err) {
      logger.error('handler.error', errorFields(err));
    }
  });

  bot.catch((err) => {
    logger.error('unhandled', errorFields(err));
  });

  logger.info('starting');
  await bot.start({ allowed_updates: ['message'] });
};
