import { AppError } from '../../shared/errors/app-error';

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMTextPart {
  type: 'text';
  text: string;
}

export interface LLMChatMessage {
  role: LLMRole;
  content: string | LLMTextPart[];
}

/** Function-tool specification in the OpenAI-compatible wire shape. */
export interface ToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: object;
  };
}

export interface LLMRequest {
  messages: LLMChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
  tools?: ToolSpec[];
  toolChoice?: 'auto' | 'none';
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  /** Segmented content blocks, when the provider returns them. */
  contentBlocks?: LLMTextPart[];
  usage?: LLMUsage;
}

export interface LLMClient {
  chat(request: LLMRequest): Promise<LLMResponse>;
}

export type LLMFailureKind = 'rate_limited' | 'timeout' | 'invalid_request' | 'service_unavailable';

export class LLMRequestError extends AppError {
  constructor(
    public readonly kind: LLMFailureKind,
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(kind === 'timeout' ? 'TIMEOUT' : 'EXTERNAL_CALL_FAILED', message, cause, { kind, status });
    this.name = 'LLMRequestError';
  }

  get retryable(): boolean {
    return this.kind !== 'invalid_request';
  }
}

/** Return response text, joining segmented content blocks when the plain content is empty. */
export function responseText(response: LLMResponse): string {
  if (response.content.trim().length > 0 || !response.contentBlocks?.length) {
    return response.content;
  }
  return response.contentBlocks.map((block) => block.text).join(' ');
}
