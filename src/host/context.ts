import { HistoryLookupError } from '../attention/errors.js';
import { errorFields, type Logger, log } from '../util/logger.js';
import type {
  ConversationSnapshot,
  ConversationSource,
  PersonaSource,
  SystemPromptResolver,
} from './types.js';

/** Conversations created before any persona was picked carry this instead of an id. */
export const NO_PERSONA_SENTINEL = '[%None]';

export interface ContextResolverOptions {
  readonly conversations: ConversationSource;
  readonly personas: PersonaSource;
  readonly logger?: Logger | undefined;
}

/**
 * Reads the host's conversation state on behalf of the scheduler. Lookup
 * failures degrade to empty context rather than failing the turn.
 */
export class ContextResolver implements SystemPromptResolver {
  private readonly logger: Logger;

  constructor(private readonly options: ContextResolverOptions) {
    this.logger = options.logger ?? log.child({ component: 'context' });
  }

  /**
   * Current conversation's persona, falling back to the default persona when
   * the conversation is missing, has none, or names one that no longer exists.
   */
  public async resolveSystemPrompt(origin: string): Promise<string> {
    const { conversations, personas } = this.options;
    try {
      const conversationId = await conversations.getCurrentConversationId(origin);
      const conversation = conversationId
        ? await conversations.getConversation(origin, conversationId)
        : undefined;
      const personaId = conversation?.personaId;
      if (personaId && personaId !== NO_PERSONA_SENTINEL) {
        const persona = personas.getPersona(personaId);
        if (persona) return persona.prompt;
        this.logger.warn('persona.not_found', { origin, personaId });
      }
      return personas.getDefaultPersona()?.prompt ?? '';
    } catch (err) {
      this.logger.error('persona.lookup_failed', {
        origin,
        ...errorFields(new HistoryLookupError(origin, { cause: err })),
      });
      return '';
    }
  }

  /** Copies the current conversation's history so later writes cannot leak into it. */
  public async capture(origin: string): Promise<ConversationSnapshot> {
    const { conversations } = this.options;
    try {
      const conversationId = await conversations.getCurrentConversationId(origin);
      if (!conversationId) return { history: [] };
      const conversation = await conversations.getConversation(origin, conversationId);
      return {
        conversationId,
        history: (conversation?.history ?? []).map((turn) => ({ ...turn })),
      };
    } catch (err) {
      this.logger.error('history.lookup_failed', {
        origin,
        ...errorFields(new HistoryLookupError(origin, { cause: err })),
      });
      return { history: [] };
    }
  }
}
