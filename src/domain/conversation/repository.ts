import { randomBytes } from 'crypto';
import { Logger } from 'pino';
import { createChildLogger } from '../../infra/logging/logger';
import { StoreUnavailableError, withTimeout } from '../../shared/errors';
import {
  AssessmentDelta,
  ConversationDocument,
  ConversationSummary,
  ConversationView,
  Message,
} from '../../shared/types';
import { SessionCache } from '../session/cache';
import { ConversationStore } from './store';

export const USER_CONVERSATION_LIMIT = 50;
export const LAST_MESSAGE_PREVIEW_LENGTH = 100;
export const DEFAULT_CONVERSATION_TITLE = 'New Conversation';

export interface ConversationRepositoryOptions {
  storeTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * `conv_{userId}_{unixSeconds}_{suffix}`. The random suffix keeps two
 * conversations created by one user within the same second apart.
 */
export function generateConversationId(userId: string, now: Date): string {
  const seconds = Math.floor(now.getTime() / 1000);
  return `conv_${userId}_${seconds}_${randomBytes(3).toString('hex')}`;
}

export function toConversationView(doc: ConversationDocument): ConversationView {
  return {
    conversationId: doc.conversationId,
    userId: doc.userId,
    title: doc.title || DEFAULT_CONVERSATION_TITLE,
    messages: doc.messages.map((m) => ({
      role: m.role,
      content: m.content,
      timestamp: m.timestamp.toISOString(),
      ...(m.messageId ? { messageId: m.messageId } : {}),
    })),
    createdAt: doc.createdAt.toISOString(),
    updatedAt: doc.updatedAt.toISOString(),
    assessmentStage: doc.assessmentStage,
    symptomsCollected: doc.symptomsCollected,
    needsDiagnosis: doc.needsDiagnosis,
  };
}

export function toConversationSummary(doc: ConversationDocument): ConversationSummary {
  return {
    conversationId: doc.conversationId,
    title: doc.title || DEFAULT_CONVERSATION_TITLE,
    lastMessage: doc.lastMessage,
    messageCount: doc.messages.length,
    createdAt: doc.createdAt.toISOString(),
    updatedAt: doc.updatedAt.toISOString(),
  };
}

/**
 * Cache-aside reads and write-through invalidation over the conversation store.
 *
 * This is the only component that decides when cache keys are read, written
 * or dropped. Store failures surface as StoreUnavailableError; cache failures
 * never leave the SessionCache.
 */
export class ConversationRepository {
  private log: Logger;
  private now: () => Date;

  constructor(
    private store: ConversationStore,
    private cache: SessionCache,
    private options: ConversationRepositoryOptions
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'conversation-repository' });
    this.now = options.now ?? (() => new Date());
  }

  async getConversation(conversationId: string): Promise<ConversationView | null> {
    const cached = await this.cache.getConversation(conversationId);
    if (cached.hit) {
      this.log.debug({ conversationId }, 'Conversation loaded from cache');
      return cached.value;
    }

    const doc = await this.runStore('findOne', () => this.store.findOne({ conversationId }));
    if (!doc) {
      this.log.info({ conversationId }, 'Conversation not found');
      return null;
    }

    const view = toConversationView(doc);
    const stored = await this.cache.putConversation(view);
    this.log.debug({ conversationId, cached: stored }, 'Conversation loaded from store');

    return view;
  }

  async getUserConversations(userId: string): Promise<ConversationSummary[]> {
    const cached = await this.cache.getUserConversations(userId);
    if (cached.hit) {
      this.log.debug({ userId }, 'User conversations loaded from cache');
      return cached.value;
    }

    const docs = await this.runStore('find', () =>
      this.store.find({ userId }, { sortBy: 'updatedAt', direction: 'desc', limit: USER_CONVERSATION_LIMIT })
    );

    const summaries = docs.map(toConversationSummary);
    const stored = await this.cache.putUserConversations(userId, summaries);
    this.log.debug({ userId, count: summaries.length, cached: stored }, 'User conversations loaded from store');

    return summaries;
  }

  /**
   * Newest conversation of the user that is not completed, straight from the store.
   */
  async findActiveConversation(userId: string): Promise<ConversationView | null> {
    const [doc] = await this.runStore('find', () =>
      this.store.find(
        { userId, excludeStages: ['completed'] },
        { sortBy: 'updatedAt', direction: 'desc', limit: 1 }
      )
    );

    return doc ? toConversationView(doc) : null;
  }

  async createConversation(
    userId: string,
    title: string = DEFAULT_CONVERSATION_TITLE
  ): Promise<ConversationView> {
    await this.completeActiveConversations(userId);

    const now = this.now();
    const doc: ConversationDocument = {
      conversationId: generateConversationId(userId, now),
      userId,
      title,
      messages: [],
      lastMessage: '',
      createdAt: now,
      updatedAt: now,
      assessmentStage: 'initial',
      symptomsCollected: {},
      needsDiagnosis: false,
    };

    await this.runStore('insertOne', () => this.store.insertOne(doc));

    // Only the list is stale; the new conversation has no cache entry yet
    await this.cache.invalidateUserConversations(userId);

    this.log.info({ conversationId: doc.conversationId, userId }, 'Conversation created');
    return toConversationView(doc);
  }

  /**
   * Force every non-completed conversation of the user into `completed`.
   * Returns the ids that were transitioned.
   */
  async completeActiveConversations(userId: string): Promise<string[]> {
    const active = await this.runStore('find', () =>
      this.store.find({ userId, excludeStages: ['completed'] })
    );

    if (active.length === 0) {
      return [];
    }

    const completed: string[] = [];
    for (const doc of active) {
      const modified = await this.runStore('updateOne', () =>
        this.store.updateOne(
          { conversationId: doc.conversationId },
          {
            set: {
              assessmentStage: 'completed',
              needsDiagnosis: false,
              updatedAt: this.now(),
            },
          }
        )
      );
      if (modified > 0) {
        completed.push(doc.conversationId);
      }
    }

    await Promise.all([
      ...completed.map((id) => this.cache.invalidateConversation(id)),
      this.cache.invalidateUserConversations(userId),
    ]);

    this.log.info({ userId, completed }, 'Completed previously active conversations');
    return completed;
  }

  async updateConversation(
    conversationId: string,
    message: Message,
    delta: AssessmentDelta = {}
  ): Promise<boolean> {
    const { symptomsCollected, ...fields } = delta;

    const modified = await this.runStore('updateOne', () =>
      this.store.updateOne(
        { conversationId },
        {
          push: message,
          ...(symptomsCollected ? { mergeEvidence: symptomsCollected } : {}),
          set: {
            ...fields,
            lastMessage: message.content.substring(0, LAST_MESSAGE_PREVIEW_LENGTH),
            updatedAt: this.now(),
          },
        }
      )
    );

    if (modified === 0) {
      this.log.warn({ conversationId }, 'Conversation update matched nothing');
      return false;
    }

    // Full view and list summary are separate projections; both are stale now
    await this.cache.invalidateConversation(conversationId);

    const owner = await this.runStore('findOne', () => this.store.findOne({ conversationId }));
    if (owner) {
      await this.cache.invalidateUserConversations(owner.userId);
    }

    this.log.debug({ conversationId, role: message.role }, 'Conversation updated');
    return true;
  }

  async deleteConversation(conversationId: string): Promise<boolean> {
    const existing = await this.runStore('findOne', () => this.store.findOne({ conversationId }));

    const deleted = await this.runStore('deleteOne', () => this.store.deleteOne({ conversationId }));
    if (deleted === 0) {
      this.log.info({ conversationId }, 'Nothing to delete');
      return false;
    }

    await Promise.all([
      this.cache.invalidateConversation(conversationId),
      existing ? this.cache.invalidateUserConversations(existing.userId) : Promise.resolve(false),
    ]);

    this.log.info({ conversationId }, 'Conversation deleted');
    return true;
  }

  private async runStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`store ${operation}`, this.options.storeTimeoutMs, fn);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.log.error({ operation, error: err.message }, 'Conversation store call failed');
      throw new StoreUnavailableError(operation, err);
    }
  }
}
