export const CHIMEIN_VERSION: string = '0.1.0';

export { ChatBuffer, DEFAULT_BUFFER_MAX_LINES, formatChatLine } from './attention/chatBuffer.js';
export type {
  Decision,
  DecisionGateOptions,
  DecisionMode,
  DecisionRequest,
  DecisionVerdict,
  PassReason,
} from './attention/decisionGate.js';
export { DecisionGate, parseDecision } from './attention/decisionGate.js';
export {
  DecisionParseError,
  HistoryLookupError,
  UpstreamUnavailableError,
} from './attention/errors.js';
export { ImmersiveSessionTable, sessionKey } from './attention/immersiveSessions.js';
export { ProactiveTimerTable } from './attention/proactiveTimers.js';
export type {
  AttentionSchedulerOptions,
  AttentionStats,
  MessageDisposition,
  ReplySentEvent,
} from './attention/scheduler.js';
export { AttentionScheduler } from './attention/scheduler.js';
export { AiSdkTextChat } from './backend/ai-sdk.js';
export type {
  HistoryTurn,
  TextChatProvider,
  TextChatProviderSource,
  TextChatRequest,
  TextChatResult,
} from './backend/types.js';
export type { LoadedChimeinConfig } from './config/load.js';
export { loadChimeinConfig } from './config/load.js';
export type { AttentionConfig, ChimeinConfig } from './config/types.js';
export { ContextResolver, NO_PERSONA_SENTINEL } from './host/context.js';
export { InMemoryConversationStore, InMemoryPersonaRegistry } from './host/memoryStore.js';
export type {
  ChatEvent,
  Conversation,
  ConversationSnapshot,
  ConversationSource,
  Outbound,
  Persona,
  PersonaSource,
  SystemPromptResolver,
} from './host/types.js';
export type { GroupId, UserId } from './types/ids.js';
export { asGroupId, asUserId } from './types/ids.js';
