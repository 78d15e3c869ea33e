import type { HistoryTurn } from '../backend/types.js';
import type { GroupId, UserId } from '../types/ids.js';

export type ChannelName = 'telegram';

/** One inbound chat message as the scheduler sees it. */
export interface ChatEvent {
  channel: ChannelName;
  /** Unified origin used for outbound sends and history lookups, e.g. `telegram:group:-100123`. */
  origin: string;
  groupId?: GroupId | undefined;
  senderId: UserId;
  /** The agent's own id on this channel. */
  selfId: UserId;
  senderName: string;
  text: string;
  isPrivate: boolean;
  timestampMs: number;
}

export interface Conversation {
  history: HistoryTurn[];
  personaId?: string | undefined;
}

export interface ConversationSnapshot {
  conversationId?: string | undefined;
  history: readonly HistoryTurn[];
}

export interface ConversationSource {
  getCurrentConversationId(origin: string): Promise<string | undefined>;
  getConversation(origin: string, conversationId: string): Promise<Conversation | undefined>;
  appendExchange(
    origin: string,
    conversationId: string | undefined,
    turns: readonly HistoryTurn[],
  ): Promise<void>;
}

export interface Persona {
  id: string;
  name: string;
  prompt: string;
}

export interface PersonaSource {
  getPersona(id: string): Persona | undefined;
  getDefaultPersona(): Persona | undefined;
}

export interface Outbound {
  /** Proactive send into a chat nobody addressed the agent in. */
  sendMessage(origin: string, content: string): Promise<void>;
  /** Reply to the message that triggered a follow-up. */
  emitPlainReply(event: ChatEvent, content: string): Promise<void>;
}

export interface SystemPromptResolver {
  resolveSystemPrompt(origin: string): Promise<string>;
}
