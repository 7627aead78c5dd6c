import Anthropic from '@anthropic-ai/sdk';
import { Logger } from 'pino';
import { AIFailureKind, AIServiceError } from '../../shared/errors';
import { CompletionMessage, CompletionRequest, CompletionResponse } from '../../shared/types';
import { createChildLogger } from '../../infra/logging/logger';
import { RateLimiter } from '../../shared/rate-limiter';

/**
 * Opaque text-completion service. Implementations throw AIServiceError.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface AnthropicCompletionOptions {
  apiKey: string;
  model: string;
  maxRequestsPerMinute: number;
  logger?: Logger;
}

export class AnthropicCompletionClient implements CompletionClient {
  private client: Anthropic;
  private rateLimiter: RateLimiter;
  private log: Logger;

  constructor(private options: AnthropicCompletionOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
    });

    this.rateLimiter = new RateLimiter({
      maxRequestsPerMinute: options.maxRequestsPerMinute,
    });

    this.log = options.logger ?? createChildLogger({ component: 'anthropic' });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    // Wait for rate limit slot
    await this.rateLimiter.acquire();

    const startTime = Date.now();

    try {
      const response = await this.client.messages.create({
        model: request.model ?? this.options.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: toAnthropicMessages(request.messages),
      });

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .filter((text) => text.length > 0)
        .join('\n');

      return {
        content: postProcess(content),
        model: response.model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      const classified = classifyAIError(error);
      this.log.warn({ kind: classified.kind, error: classified.message }, 'Completion request failed');
      throw classified;
    }
  }
}

/**
 * The Messages API wants the first turn from the user.
 */
export function toAnthropicMessages(messages: CompletionMessage[]): CompletionMessage[] {
  const firstUser = messages.findIndex((m) => m.role === 'user');
  if (firstUser === -1) {
    throw new AIServiceError('No user message to complete', 'unknown');
  }

  return messages.slice(firstUser).map((m) => ({ role: m.role, content: m.content }));
}

export function classifyAIError(error: unknown): AIServiceError {
  if (error instanceof AIServiceError) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;
  const message = err.message.toLowerCase();

  let kind: AIFailureKind = 'unknown';
  if (status === 402 || message.includes('402') || message.includes('credit')) {
    kind = 'credits';
  } else if (status === 401 || status === 403 || message.includes('401') || message.includes('unauthorized')) {
    kind = 'auth';
  } else if (status === 429 || message.includes('429') || message.includes('rate_limit')) {
    kind = 'rate_limit';
  }

  return new AIServiceError(err.message, kind, err);
}

/**
 * Plain-text cleanup of a completion
 */
export function postProcess(content: string): string {
  return content
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/^#+\s+/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

// ============================================================================
// User-safe replies
// ============================================================================

export const SUPPORT_CONTACT = 'our support team';

export function failureReply(error: AIServiceError): string {
  switch (error.kind) {
    case 'credits':
      return `I'm currently unable to process your request because the assistant's usage limit has been reached. Please contact ${SUPPORT_CONTACT} or try again later.`;
    case 'auth':
      return `I'm currently unable to process your request due to a configuration problem on our side. Please contact ${SUPPORT_CONTACT}.`;
    default:
      return "I'm sorry, I'm experiencing technical difficulties right now. Please try again in a moment.";
  }
}

const OFFLINE_REPLIES: Array<{ keywords: string[]; reply: string }> = [
  {
    keywords: ['hello', 'hi', 'hey', 'start'],
    reply: "Hello! I'm your health and wellness assistant. My AI analysis is unavailable right now, but I can still help you get started. Please describe any skin, hair or health concerns you'd like to discuss.",
  },
  {
    keywords: ['skin', 'acne', 'rash', 'dry', 'oily'],
    reply: 'I understand you are concerned about your skin. Common skin concerns are often related to diet, stress, hormones or skincare routines. Would you like to share more details about what you are noticing?',
  },
  {
    keywords: ['hair', 'thinning'],
    reply: 'Hair health is often connected to internal factors like nutrition, stress and hormonal balance. What specific hair changes are you experiencing?',
  },
  {
    keywords: ['help', 'support', 'contact'],
    reply: `I'm here to help. My AI analysis is unavailable right now, so for anything urgent please reach out to ${SUPPORT_CONTACT}.`,
  },
];

const OFFLINE_DEFAULT_REPLY =
  "Thank you for your message. My AI analysis is unavailable right now, but please keep describing your health concerns and I'll guide you as best I can.";

/**
 * Keyword reply used when no completion client is configured.
 */
export function offlineReply(userMessage: string): string {
  const words = new Set(userMessage.toLowerCase().split(/[^\p{L}\p{N}]+/u));
  const match = OFFLINE_REPLIES.find((entry) => entry.keywords.some((keyword) => words.has(keyword)));
  return match ? match.reply : OFFLINE_DEFAULT_REPLY;
}
