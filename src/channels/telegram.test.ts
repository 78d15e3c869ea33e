import { describe, expect, test } from 'vitest';

import { DecisionGate } from '../attention/decisionGate.js';
import { AttentionScheduler, type ReplySentEvent } from '../attention/scheduler.js';
import { ContextResolver } from '../host/context.js';
import { InMemoryConversationStore, InMemoryPersonaRegistry } from '../host/memoryStore.js';
import {
  decisionJson,
  groupMessage,
  ScriptedTextChat,
  TEST_ORIGIN,
  testAttentionConfig,
} from '../testing/fakes.js';
import { asGroupId, asUserId } from '../types/ids.js';
import {
  createReplyNotifier,
  handleTelegramText,
  isAddressedToBot,
  parseTelegramOrigin,
  resolveTelegramConfig,
  type TelegramInbound,
  TelegramOutbound,
  telegramOrigin,
  toChatEvent,
} from './telegram.js';

const inbound = (
  text: string,
  overrides: {
    chatType?: string;
    entities?: TelegramInbound['message']['entities'];
    replyToId?: number;
  } = {},
): TelegramInbound => ({
  chat: { id: -100, type: overrides.chatType ?? 'supergroup' },
  from: { id: 7, first_name: 'Ada', last_name: 'L' },
  me: { id: 999, username: 'chimebot' },
  message: {
    message_id: 1,
    date: 1_700_000_000,
    text,
    entities: overrides.entities,
    reply_to_message:
      overrides.replyToId !== undefined ? { from: { id: overrides.replyToId } } : undefined,
  },
});

class FakeApi {
  public readonly calls: Array<{ chatId: number; text: string }> = [];
  public async sendMessage(chatId: number, text: string): Promise<unknown> {
    this.calls.push({ chatId, text });
    return { message_id: this.calls.length };
  }
}

describe('telegram helpers', () => {
  test('builds and parses origins', () => {
    expect(telegramOrigin({ id: -100, type: 'group' })).toBe('telegram:group:-100');
    expect(telegramOrigin({ id: 42, type: 'private' })).toBe('telegram:private:42');
    expect(parseTelegramOrigin('telegram:group:-100')).toBe(-100);
    expect(parseTelegramOrigin('telegram:private:42')).toBe(42);
    expect(parseTelegramOrigin('signal:group:1')).toBeUndefined();
    expect(parseTelegramOrigin('telegram:group:abc')).toBeUndefined();
  });

  test('maps a group message to a chat event', () => {
    expect(toChatEvent(inbound('  hello all  '))).toEqual({
      channel: 'telegram',
      origin: 'telegram:group:-100',
      groupId: asGroupId('tg:-100'),
      senderId: asUserId('tg:7'),
      selfId: asUserId('tg:999'),
      senderName: 'Ada L',
      text: 'hello all',
      isPrivate: false,
      timestampMs: 1_700_000_000_000,
    });
  });

  test('private messages carry no group id', () => {
    const event = toChatEvent(inbound('hi', { chatType: 'private' }));
    expect(event?.isPrivate).toBe(true);
    expect(event?.groupId).toBeUndefined();
    expect(event?.origin).toBe('telegram:private:-100');
  });

  test('skips blank messages', () => {
    expect(toChatEvent(inbound('   '))).toBeUndefined();
  });

  test('detects mentions and replies to the bot', () => {
    expect(isAddressedToBot(inbound('hey there'))).toBe(false);
    expect(
      isAddressedToBot(
        inbound('@chimebot hey', { entities: [{ type: 'mention', offset: 0, length: 9 }] }),
      ),
    ).toBe(true);
    expect(
      isAddressedToBot(
        inbound('@otherbot hey', { entities: [{ type: 'mention', offset: 0, length: 9 }] }),
      ),
    ).toBe(false);
    expect(isAddressedToBot(inbound('sure', { replyToId: 999 }))).toBe(true);
    expect(isAddressedToBot(inbound('sure', { replyToId: 5 }))).toBe(false);
    expect(isAddressedToBot(inbound('dm', { chatType: 'private' }))).toBe(true);
  });

  test('requires a bot token', () => {
    expect(() => resolveTelegramConfig({})).toThrow('TELEGRAM_BOT_TOKEN');
    expect(resolveTelegramConfig({ TELEGRAM_BOT_TOKEN: ' test-secret ' })).toEqual({
      token: 'test-secret',
    });
  });
});

describe('TelegramOutbound', () => {
  test('sends to the chat named by the origin', async () => {
    const api = new FakeApi();
    const outbound = new TelegramOutbound(api);

    await outbound.sendMessage('telegram:group:-100', 'hi');
    expect(api.calls).toEqual([{ chatId: -100, text: 'hi' }]);
  });

  test('rejects origins from other channels', async () => {
    const outbound = new TelegramOutbound(new FakeApi());
    await expect(outbound.sendMessage('local:1', 'hi')).rejects.toThrow(
      'Not a Telegram origin: local:1',
    );
  });

  test('notifies the reply listener after a plain reply', async () => {
    const api = new FakeApi();
    const outbound = new TelegramOutbound(api);
    const seen: string[] = [];
    outbound.onPlainReply(async (event, content) => {
      seen.push(`${event.senderId}:${content}:${api.calls.length}`);
    });

    await outbound.emitPlainReply(groupMessage('tg:1', 'question'), 'answer');
    expect(seen).toEqual(['tg:1:answer:1']);
  });

  test('a failing listener does not fail the reply', async () => {
    const outbound = new TelegramOutbound(new FakeApi());
    outbound.onPlainReply(async () => {
      throw new Error('listener broke');
    });

    await expect(
      outbound.emitPlainReply(groupMessage('tg:1', 'q'), 'a'),
    ).resolves.toBeUndefined();
  });
});

describe('createReplyNotifier', () => {
  test('arms the scheduler with history that includes the new exchange', async () => {
    const store = new InMemoryConversationStore({ newId: () => 'c1' });
    await store.appendExchange(TEST_ORIGIN, undefined, [{ role: 'user', content: 'earlier' }]);
    const context = new ContextResolver({
      conversations: store,
      personas: new InMemoryPersonaRegistry([]),
    });
    const events: ReplySentEvent[] = [];
    const notify = createReplyNotifier({
      context,
      scheduler: { onReplySent: (e) => events.push(e) },
    });

    await notify(groupMessage('tg:1', 'what now?'), 'lunch');

    expect(events).toEqual([
      {
        groupId: asGroupId('tg:-100'),
        userId: asUserId('tg:1'),
        origin: TEST_ORIGIN,
        context: {
          conversationId: 'c1',
          history: [
            { role: 'user', content: 'earlier' },
            { role: 'user', content: 'what now?' },
            { role: 'assistant', content: 'lunch' },
          ],
        },
      },
    ]);
  });

  test('ignores private replies', async () => {
    const events: ReplySentEvent[] = [];
    const notify = createReplyNotifier({
      context: { capture: async () => ({ history: [] }) },
      scheduler: { onReplySent: (e) => events.push(e) },
    });

    await notify(groupMessage('tg:1', 'hi', { groupId: undefined, isPrivate: true }), 'hey');
    expect(events).toEqual([]);
  });
});

describe('handleTelegramText', () => {
  const mention = (text: string) =>
    inbound(text, { entities: [{ type: 'mention', offset: 0, length: 9 }] });

  const setup = (yields = true) => {
    const store = new InMemoryConversationStore({ newId: () => 'c1' });
    const personas = new InMemoryPersonaRegistry(
      [{ id: 'p1', name: 'default', prompt: 'be brief' }],
      'p1',
    );
    const context = new ContextResolver({ conversations: store, personas });
    const api = new FakeApi();
    const outbound = new TelegramOutbound(api);
    const chat = new ScriptedTextChat(['  hello Ada  ']);
    const routed: string[] = [];
    const yielded: string[] = [];
    const deps = {
      scheduler: {
        onMessage: async (event: { text: string }) => {
          routed.push(event.text);
          return 'buffered' as const;
        },
        yieldToHost: (event: { text: string }) => {
          yielded.push(event.text);
          return yields;
        },
      },
      outbound,
      context,
      history: store,
      providers: () => chat,
    };
    return { api, chat, deps, routed, store, yielded };
  };

  test('answers a mention and records the exchange', async () => {
    const { api, chat, deps, routed, store, yielded } = setup();

    await handleTelegramText(deps, mention('@chimebot hi'));

    expect(yielded).toEqual(['@chimebot hi']);
    expect(routed).toEqual([]);
    expect(chat.requests[0]).toMatchObject({ prompt: '@chimebot hi', systemPrompt: 'be brief' });
    expect(api.calls).toEqual([{ chatId: -100, text: 'hello Ada' }]);
    expect((await store.getConversation('telegram:group:-100', 'c1'))?.history).toEqual([
      { role: 'user', content: '@chimebot hi' },
      { role: 'assistant', content: 'hello Ada' },
    ]);
  });

  test('hands unaddressed messages to the scheduler and stays quiet', async () => {
    const { api, chat, deps, routed, yielded } = setup();

    await handleTelegramText(deps, inbound('just chatting'));
    expect(routed).toEqual(['just chatting']);
    expect(yielded).toEqual([]);
    expect(chat.requests).toHaveLength(0);
    expect(api.calls).toEqual([]);
  });

  test('leaves addressed commands alone', async () => {
    const { api, chat, deps, routed } = setup(false);

    await handleTelegramText(deps, mention('@chimebot /reset'));
    expect(routed).toEqual([]);
    expect(chat.requests).toHaveLength(0);
    expect(api.calls).toEqual([]);
  });

  test('replies to the bot even while the sender has a follow-up pending', async () => {
    const store = new InMemoryConversationStore({ newId: () => 'c1' });
    const context = new ContextResolver({
      conversations: store,
      personas: new InMemoryPersonaRegistry([]),
    });
    const api = new FakeApi();
    const outbound = new TelegramOutbound(api);
    const decisions = new ScriptedTextChat([decisionJson(false)]);
    const scheduler = new AttentionScheduler({
      config: testAttentionConfig(),
      gate: new DecisionGate({ providers: () => decisions }),
      prompts: context,
      history: store,
      outbound,
    });
    outbound.onPlainReply(createReplyNotifier({ context, scheduler }));
    const group = asGroupId('tg:-100');
    const ada = asUserId('tg:7');
    scheduler.onReplySent({
      groupId: group,
      userId: ada,
      origin: 'telegram:group:-100',
      context: { history: [] },
    });
    const host = new ScriptedTextChat(['sure, once more']);
    const deps = { scheduler, outbound, context, history: store, providers: () => host };

    await handleTelegramText(
      deps,
      inbound('@chimebot can you explain that again?', { replyToId: 999 }),
    );

    expect(api.calls).toEqual([{ chatId: -100, text: 'sure, once more' }]);
    expect(decisions.requests).toHaveLength(0);
    expect(scheduler.hasSession(group, ada)).toBe(true);

    await handleTelegramText(deps, inbound('thanks'));
    await scheduler.idle();
    expect(decisions.requests).toHaveLength(1);
    expect(api.calls).toHaveLength(1);

    await scheduler.shutdown();
  });
});
