export type HistoryRole = 'user' | 'assistant';

export interface HistoryTurn {
  role: HistoryRole;
  content: string;
}

export interface TextChatRequest {
  prompt: string;
  history: readonly HistoryTurn[];
  systemPrompt: string;
  signal?: AbortSignal | undefined;
}

export interface TextChatResult {
  /** Anything other than `assistant` means the provider produced no usable answer. */
  role: string;
  completionText: string;
  modelId?: string | undefined;
}

export interface TextChatProvider {
  textChat(request: TextChatRequest): Promise<TextChatResult>;
}

/** Looked up per call; `undefined` when no LLM is configured. */
export type TextChatProviderSource = () => TextChatProvider | undefined;
