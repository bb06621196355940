export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * A text-completion capability. Implementations make exactly one request per
 * call and throw AIServiceError / ParsingError on failure; retrying is the
 * caller's job.
 */
export interface ICompletionProvider {
  complete(request: CompletionRequest, options?: CompletionOptions): Promise<string>;
}
