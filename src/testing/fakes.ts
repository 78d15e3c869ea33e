import type { TextChatProvider, TextChatRequest, TextChatResult } from '../backend/types.js';
import { DEFAULT_ATTENTION } from '../config/defaults.js';
import type { AttentionConfig, ImmersiveConfig, ProactiveConfig } from '../config/types.js';
import type { ChatEvent, Outbound } from '../host/types.js';
import { asGroupId, asUserId } from '../types/ids.js';

export type ScriptedReply = string | Error | TextChatResult;

/** Answers each call with the next scripted reply; the last one repeats. */
export class ScriptedTextChat implements TextChatProvider {
  public readonly requests: TextChatRequest[] = [];

  constructor(private readonly replies: readonly ScriptedReply[]) {}

  public async textChat(request: TextChatRequest): Promise<TextChatResult> {
    this.requests.push(request);
    const reply = this.replies[Math.min(this.requests.length, this.replies.length) - 1];
    if (reply === undefined) throw new Error('ScriptedTextChat has no replies');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'string') return { role: 'assistant', completionText: reply };
    return reply;
  }
}

export const decisionJson = (shouldReply: boolean, content = ''): string =>
  JSON.stringify({ should_reply: shouldReply, reply_content: content });

export interface SentMessage {
  kind: 'proactive' | 'reply';
  origin: string;
  content: string;
}

export class RecordingOutbound implements Outbound {
  public readonly sent: SentMessage[] = [];

  public async sendMessage(origin: string, content: string): Promise<void> {
    this.sent.push({ kind: 'proactive', origin, content });
  }

  public async emitPlainReply(event: ChatEvent, content: string): Promise<void> {
    this.sent.push({ kind: 'reply', origin: event.origin, content });
  }
}

export const TEST_GROUP = asGroupId('tg:-100');
export const TEST_ORIGIN = 'telegram:group:-100';
export const BOT_ID = asUserId('tg:999');

export const groupMessage = (
  senderId: string,
  text: string,
  overrides: Partial<ChatEvent> = {},
): ChatEvent => ({
  channel: 'telegram',
  origin: TEST_ORIGIN,
  groupId: TEST_GROUP,
  senderId: asUserId(senderId),
  selfId: BOT_ID,
  senderName: senderId,
  text,
  isPrivate: false,
  timestampMs: Date.now(),
  ...overrides,
});

export const testAttentionConfig = (
  overrides: {
    commandPrefixes?: string[];
    immersive?: Partial<ImmersiveConfig>;
    proactive?: Partial<ProactiveConfig>;
    enabled?: boolean;
  } = {},
): AttentionConfig => ({
  ...DEFAULT_ATTENTION,
  enabled: overrides.enabled ?? DEFAULT_ATTENTION.enabled,
  commandPrefixes: overrides.commandPrefixes ?? [...DEFAULT_ATTENTION.commandPrefixes],
  immersive: { ...DEFAULT_ATTENTION.immersive, ...overrides.immersive },
  proactive: { ...DEFAULT_ATTENTION.proactive, ...overrides.proactive },
});
