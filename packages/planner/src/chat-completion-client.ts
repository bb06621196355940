import { z } from 'zod';
import { AIServiceError, ParsingError, createLogger, toErrorMessage } from '@lifeline/core';
import type {
  AIServiceErrorKind,
  CompletionOptions,
  CompletionRequest,
  ICompletionProvider,
} from '@lifeline/core';

const log = createLogger('ChatCompletion');

export interface ChatCompletionClientOptions {
  /** e.g. https://api.deepseek.com/v1 */
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

const ErrorResponseSchema = z.object({
  error: z.object({ message: z.string() }),
});

export function errorKindForStatus(status: number): AIServiceErrorKind {
  if (status === 400) return 'bad_request';
  if (status === 401 || status === 403) return 'unauthorized';
  if (status === 429) return 'rate_limited';
  return 'server_error';
}

/**
 * Client for OpenAI-compatible `/chat/completions` endpoints.
 * One call is one HTTP request; retry policy lives in AIFailurePolicy.
 */
export class ChatCompletionClient implements ICompletionProvider {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: ChatCompletionClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async complete(request: CompletionRequest, options?: CompletionOptions): Promise<string> {
    const signal = options?.signal
      ? AbortSignal.any([options.signal, AbortSignal.timeout(this.timeoutMs)])
      : AbortSignal.timeout(this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: false,
        }),
        signal,
      });
    } catch (error) {
      // Caller cancellation is not a network failure; let it through as-is
      if (options?.signal?.aborted) throw error;
      throw new AIServiceError('network', `Request to completion service failed: ${toErrorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      const kind = errorKindForStatus(response.status);
      log.warn(`Completion request failed with ${response.status} (${kind})`);
      throw new AIServiceError(kind, `Completion service error (${response.status}): ${detail}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ParsingError(`Completion response is not JSON: ${toErrorMessage(error)}`, { cause: error });
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParsingError('Completion response has an unexpected shape');
    }

    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw new ParsingError('Completion response contained no choices');
    }
    return content;
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return response.statusText || 'unknown error';
  }

  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return text.slice(0, 200) || response.statusText || 'unknown error';
  }

  const parsed = ErrorResponseSchema.safeParse(payload);
  return parsed.success ? parsed.data.error.message : text.slice(0, 200);
}
