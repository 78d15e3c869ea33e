import { randomUUID } from 'node:crypto';

import type { HistoryTurn } from '../backend/types.js';
import type { Conversation, ConversationSource, Persona, PersonaSource } from './types.js';

interface OriginState {
  currentId: string;
  conversations: Map<string, Conversation>;
}

export interface InMemoryConversationStoreOptions {
  /** Oldest turns beyond this are dropped on append. */
  readonly maxTurns?: number | undefined;
  readonly newId?: (() => string) | undefined;
}

const DEFAULT_MAX_TURNS = 50;

/** Process-local conversation history, one current conversation per origin. */
export class InMemoryConversationStore implements ConversationSource {
  private readonly origins = new Map<string, OriginState>();
  private readonly maxTurns: number;
  private readonly newId: () => string;

  constructor(options: InMemoryConversationStoreOptions = {}) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.newId = options.newId ?? randomUUID;
  }

  public startConversation(origin: string, personaId?: string | undefined): string {
    const id = this.newId();
    const state = this.origins.get(origin) ?? {
      currentId: id,
      conversations: new Map<string, Conversation>(),
    };
    state.currentId = id;
    state.conversations.set(id, personaId ? { history: [], personaId } : { history: [] });
    this.origins.set(origin, state);
    return id;
  }

  public async getCurrentConversationId(origin: string): Promise<string | undefined> {
    return this.origins.get(origin)?.currentId;
  }

  public async getConversation(
    origin: string,
    conversationId: string,
  ): Promise<Conversation | undefined> {
    const conversation = this.origins.get(origin)?.conversations.get(conversationId);
    if (!conversation) return undefined;
    return { ...conversation, history: conversation.history.map((t) => ({ ...t })) };
  }

  public async appendExchange(
    origin: string,
    conversationId: string | undefined,
    turns: readonly HistoryTurn[],
  ): Promise<void> {
    const id = conversationId ?? this.origins.get(origin)?.currentId;
    const target =
      id !== undefined ? this.origins.get(origin)?.conversations.get(id) : undefined;
    const conversation = target ?? this.requireConversation(origin);
    conversation.history.push(...turns.map((t) => ({ ...t })));
    const overflow = conversation.history.length - this.maxTurns;
    if (overflow > 0) conversation.history.splice(0, overflow);
  }

  private requireConversation(origin: string): Conversation {
    const id = this.startConversation(origin);
    const created = this.origins.get(origin)?.conversations.get(id);
    if (!created) throw new Error(`conversation ${id} vanished for ${origin}`);
    return created;
  }
}

export class InMemoryPersonaRegistry implements PersonaSource {
  private readonly personas = new Map<string, Persona>();

  constructor(
    personas: readonly Persona[],
    private readonly defaultId?: string | undefined,
  ) {
    for (const persona of personas) this.personas.set(persona.id, persona);
  }

  public getPersona(id: string): Persona | undefined {
    return this.personas.get(id);
  }

  public getDefaultPersona(): Persona | undefined {
    return this.defaultId !== undefined ? this.personas.get(this.defaultId) : undefined;
  }
}
