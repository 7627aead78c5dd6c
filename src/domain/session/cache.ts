import { Logger } from 'pino';
import { z } from 'zod';
import { CacheBackend } from '../../infra/cache/client';
import { createChildLogger } from '../../infra/logging/logger';
import { withTimeout } from '../../shared/errors';
import { ConversationSummary, ConversationView } from '../../shared/types';

export const CACHE_TTL_SECONDS = 24 * 60 * 60;

export type CacheLookup<T> =
  | { hit: true; value: T }
  | { hit: false; degraded: boolean };

type Attempt<T> = { ok: true; value: T } | { ok: false };

export function conversationKey(conversationId: string): string {
  return `conversation:${conversationId}`;
}

export function userConversationsKey(userId: string): string {
  return `user_conversations:${userId}`;
}

// ============================================================================
// Cached payload schemas
// ============================================================================

const evidenceSchema = z.record(
  z.object({
    category: z.string(),
    mentioned: z.literal(true),
  })
);

const stageSchema = z.enum(['initial', 'gathering_info', 'diagnostic_ready', 'completed']);

export const conversationViewSchema: z.ZodType<ConversationView> = z.object({
  conversationId: z.string(),
  userId: z.string(),
  title: z.string(),
  messages: z.array(
    z.object({
      role: z.enum(['user', 'assistant']),
      content: z.string(),
      timestamp: z.string(),
      messageId: z.string().optional(),
    })
  ),
  createdAt: z.string(),
  updatedAt: z.string(),
  assessmentStage: stageSchema,
  symptomsCollected: evidenceSchema,
  needsDiagnosis: z.boolean(),
});

export const conversationSummariesSchema: z.ZodType<ConversationSummary[]> = z.array(
  z.object({
    conversationId: z.string(),
    title: z.string(),
    lastMessage: z.string(),
    messageCount: z.number().int().nonnegative(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })
);

// ============================================================================
// Session Cache
// ============================================================================

export interface SessionCacheOptions {
  timeoutMs: number;
  logger?: Logger;
}

/**
 * TTL cache for conversation snapshots and per-user conversation lists.
 *
 * With no backend, or when the backend errors or times out, every call is a
 * no-op: puts and deletes return false and lookups report a degraded miss.
 * Nothing here throws.
 */
export class SessionCache {
  private log: Logger;

  constructor(
    private backend: CacheBackend | null,
    private options: SessionCacheOptions
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'session-cache' });
  }

  get enabled(): boolean {
    return this.backend !== null;
  }

  async put(key: string, value: unknown, ttlSeconds: number = CACHE_TTL_SECONDS): Promise<boolean> {
    const result = await this.attempt('put', key, (backend) =>
      backend.set(key, JSON.stringify(value), ttlSeconds)
    );
    if (result.ok) {
      this.log.debug({ key, ttlSeconds }, 'Cache entry stored');
    }
    return result.ok;
  }

  async get<T>(key: string, schema: z.ZodType<T>): Promise<CacheLookup<T>> {
    const result = await this.attempt('get', key, (backend) => backend.get(key));
    if (!result.ok) {
      return { hit: false, degraded: true };
    }
    if (result.value === null) {
      return { hit: false, degraded: false };
    }

    const parsed = this.decode(result.value, schema);
    if (!parsed.ok) {
      this.log.warn({ key }, 'Discarding unreadable cache entry');
      await this.delete(key);
      return { hit: false, degraded: false };
    }

    this.log.debug({ key }, 'Cache hit');
    return { hit: true, value: parsed.value };
  }

  async delete(key: string): Promise<boolean> {
    const result = await this.attempt('delete', key, (backend) => backend.del(key));
    if (result.ok) {
      this.log.debug({ key }, 'Cache entry invalidated');
    }
    return result.ok;
  }

  async ping(): Promise<boolean> {
    const result = await this.attempt('ping', '*', (backend) => backend.ping());
    return result.ok;
  }

  // ==========================================================================
  // Typed accessors
  // ==========================================================================

  getConversation(conversationId: string): Promise<CacheLookup<ConversationView>> {
    return this.get(conversationKey(conversationId), conversationViewSchema);
  }

  putConversation(conversation: ConversationView): Promise<boolean> {
    return this.put(conversationKey(conversation.conversationId), conversation);
  }

  invalidateConversation(conversationId: string): Promise<boolean> {
    return this.delete(conversationKey(conversationId));
  }

  getUserConversations(userId: string): Promise<CacheLookup<ConversationSummary[]>> {
    return this.get(userConversationsKey(userId), conversationSummariesSchema);
  }

  putUserConversations(userId: string, conversations: ConversationSummary[]): Promise<boolean> {
    return this.put(userConversationsKey(userId), conversations);
  }

  invalidateUserConversations(userId: string): Promise<boolean> {
    return this.delete(userConversationsKey(userId));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async attempt<T>(
    operation: string,
    key: string,
    fn: (backend: CacheBackend) => Promise<T>
  ): Promise<Attempt<T>> {
    const backend = this.backend;
    if (!backend) {
      return { ok: false };
    }

    try {
      const value = await withTimeout(`cache ${operation}`, this.options.timeoutMs, () => fn(backend));
      return { ok: true, value };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.warn({ operation, key, error: err.message }, 'Cache degraded to miss');
      return { ok: false };
    }
  }

  private decode<T>(raw: string, schema: z.ZodType<T>): Attempt<T> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return { ok: false };
    }

    const result = schema.safeParse(json);
    return result.success ? { ok: true, value: result.data } : { ok: false };
  }
}
