/**
 * Tests for cache-aside reads and write-through invalidation
 */

import {
  DEFAULT_CONVERSATION_TITLE,
  USER_CONVERSATION_LIMIT,
  generateConversationId,
} from '../src/domain/conversation/repository';
import { StoreUnavailableError } from '../src/shared/errors';
import { ConversationDocument, Message } from '../src/shared/types';
import { Harness, createHarness } from './support/harness';

function userMessage(content: string, at: Date): Message {
  return { role: 'user', content, timestamp: at, messageId: `msg_${content.length}` };
}

function storedDoc(overrides: Partial<ConversationDocument> & { conversationId: string }): ConversationDocument {
  const at = new Date('2024-04-01T00:00:00.000Z');
  return {
    userId: 'user-1',
    title: 'Stored',
    messages: [],
    lastMessage: '',
    createdAt: at,
    updatedAt: at,
    assessmentStage: 'completed',
    symptomsCollected: {},
    needsDiagnosis: false,
    ...overrides,
  };
}

describe('ConversationRepository', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('generateConversationId', () => {
    it('should embed user id, unix seconds and a hex suffix', () => {
      const id = generateConversationId('user-1', new Date('2024-05-01T10:00:00.500Z'));
      expect(id).toMatch(/^conv_user-1_1714557600_[0-9a-f]{6}$/);
    });

    it('should differ for two ids in the same second', () => {
      const at = new Date('2024-05-01T10:00:00.000Z');
      expect(generateConversationId('user-1', at)).not.toBe(generateConversationId('user-1', at));
    });
  });

  describe('createConversation', () => {
    it('should start in the initial stage with no evidence', async () => {
      const view = await h.repository.createConversation('user-1');

      expect(view.conversationId).toMatch(/^conv_user-1_1714557600_[0-9a-f]{6}$/);
      expect(view.title).toBe(DEFAULT_CONVERSATION_TITLE);
      expect(view.messages).toEqual([]);
      expect(view.assessmentStage).toBe('initial');
      expect(view.symptomsCollected).toEqual({});
      expect(view.needsDiagnosis).toBe(false);
      expect(view.createdAt).toBe('2024-05-01T10:00:00.000Z');
      expect(view.updatedAt).toBe(view.createdAt);
      expect(h.store.docs[0]?.lastMessage).toBe('');
    });

    it('should keep a custom title', async () => {
      const view = await h.repository.createConversation('user-1', 'Hair questions');
      expect(view.title).toBe('Hair questions');
    });

    it('should invalidate the user list', async () => {
      expect(await h.repository.getUserConversations('user-1')).toEqual([]);
      expect(h.backend?.entries.has('user_conversations:user-1')).toBe(true);

      await h.repository.createConversation('user-1');

      expect(h.backend?.entries.has('user_conversations:user-1')).toBe(false);
      const list = await h.repository.getUserConversations('user-1');
      expect(list).toHaveLength(1);
    });

    it('should complete the previous active conversation', async () => {
      const first = await h.repository.createConversation('user-1');
      // Warm the cache with the still-active view
      await h.repository.getConversation(first.conversationId);
      await h.repository.getUserConversations('user-1');

      h.clock.advance(5000);
      const second = await h.repository.createConversation('user-1');

      expect(h.backend?.entries.has(`conversation:${first.conversationId}`)).toBe(false);
      expect(h.backend?.entries.has('user_conversations:user-1')).toBe(false);

      const previous = await h.repository.getConversation(first.conversationId);
      expect(previous?.assessmentStage).toBe('completed');
      expect(previous?.needsDiagnosis).toBe(false);

      const current = await h.repository.getConversation(second.conversationId);
      expect(current?.assessmentStage).toBe('initial');

      const active = h.store.docs.filter((d) => d.userId === 'user-1' && d.assessmentStage !== 'completed');
      expect(active.map((d) => d.conversationId)).toEqual([second.conversationId]);
    });

    it('should leave other users alone', async () => {
      const other = await h.repository.createConversation('user-2');
      await h.repository.createConversation('user-1');

      expect((await h.repository.getConversation(other.conversationId))?.assessmentStage).toBe('initial');
    });
  });

  describe('completeActiveConversations', () => {
    it('should return the ids it completed', async () => {
      h.store.docs.push(
        storedDoc({ conversationId: 'conv_a', assessmentStage: 'gathering_info' }),
        storedDoc({ conversationId: 'conv_b', assessmentStage: 'diagnostic_ready', needsDiagnosis: true }),
        storedDoc({ conversationId: 'conv_c', assessmentStage: 'completed' })
      );

      const completed = await h.repository.completeActiveConversations('user-1');

      expect(completed).toEqual(['conv_a', 'conv_b']);
      expect(h.store.docs.every((d) => d.assessmentStage === 'completed' && !d.needsDiagnosis)).toBe(true);
    });

    it('should do nothing when no conversation is active', async () => {
      expect(await h.repository.completeActiveConversations('user-1')).toEqual([]);
      expect(h.backend?.calls.del).toBe(0);
    });
  });

  describe('getConversation', () => {
    it('should read the store once and then serve from cache', async () => {
      const created = await h.repository.createConversation('user-1');
      h.store.resetCalls();

      const first = await h.repository.getConversation(created.conversationId);
      const second = await h.repository.getConversation(created.conversationId);

      expect(second).toEqual(first);
      expect(h.store.calls.findOne).toBe(1);
    });

    it('should return null for unknown ids without caching', async () => {
      expect(await h.repository.getConversation('conv_missing')).toBeNull();
      expect(h.backend?.entries.size).toBe(0);
    });
  });

  describe('getUserConversations', () => {
    it('should sort by updatedAt descending and cap the list', async () => {
      for (let i = 0; i < USER_CONVERSATION_LIMIT + 5; i++) {
        const at = new Date(Date.UTC(2024, 0, 1, 0, i));
        h.store.docs.push(storedDoc({ conversationId: `conv_${i}`, createdAt: at, updatedAt: at }));
      }

      const list = await h.repository.getUserConversations('user-1');

      expect(list).toHaveLength(50);
      expect(list[0]?.conversationId).toBe('conv_54');
      expect(list[49]?.conversationId).toBe('conv_5');
    });

    it('should project summaries', async () => {
      h.store.docs.push(
        storedDoc({
          conversationId: 'conv_x',
          title: '',
          lastMessage: 'hello',
          messages: [userMessage('hello', new Date('2024-04-01T00:00:00.000Z'))],
        })
      );

      expect(await h.repository.getUserConversations('user-1')).toEqual([
        {
          conversationId: 'conv_x',
          title: 'New Conversation',
          lastMessage: 'hello',
          messageCount: 1,
          createdAt: '2024-04-01T00:00:00.000Z',
          updatedAt: '2024-04-01T00:00:00.000Z',
        },
      ]);
    });
  });

  describe('updateConversation', () => {
    it('should append the message and merge the delta', async () => {
      const created = await h.repository.createConversation('user-1');
      h.clock.advance(1000);

      const modified = await h.repository.updateConversation(
        created.conversationId,
        userMessage('I have acne', h.clock.now()),
        {
          symptomsCollected: { acne: { category: 'skin_conditions', mentioned: true } },
          assessmentStage: 'gathering_info',
          needsDiagnosis: false,
        }
      );

      expect(modified).toBe(true);
      const view = await h.repository.getConversation(created.conversationId);
      expect(view?.messages.map((m) => m.content)).toEqual(['I have acne']);
      expect(view?.symptomsCollected).toEqual({ acne: { category: 'skin_conditions', mentioned: true } });
      expect(view?.assessmentStage).toBe('gathering_info');
      expect(view?.updatedAt).toBe('2024-05-01T10:00:01.000Z');
    });

    it('should keep only the first 100 characters as preview', async () => {
      const created = await h.repository.createConversation('user-1');
      const long = 'a'.repeat(150);

      await h.repository.updateConversation(created.conversationId, userMessage(long, h.clock.now()));

      const [summary] = await h.repository.getUserConversations('user-1');
      expect(summary?.lastMessage).toBe('a'.repeat(100));
      expect(summary?.messageCount).toBe(1);
    });

    it('should invalidate both keys so each is re-fetched exactly once', async () => {
      const created = await h.repository.createConversation('user-1');
      await h.repository.getConversation(created.conversationId);
      await h.repository.getUserConversations('user-1');

      await h.repository.updateConversation(created.conversationId, userMessage('hello', h.clock.now()));
      h.store.resetCalls();

      await h.repository.getConversation(created.conversationId);
      await h.repository.getConversation(created.conversationId);
      await h.repository.getUserConversations('user-1');
      await h.repository.getUserConversations('user-1');

      expect(h.store.calls.findOne).toBe(1);
      expect(h.store.calls.find).toBe(1);
    });

    it('should never move updatedAt backwards', async () => {
      const created = await h.repository.createConversation('user-1');
      h.clock.advance(-60_000);

      await h.repository.updateConversation(created.conversationId, userMessage('late clock', h.clock.now()));

      const view = await h.repository.getConversation(created.conversationId);
      expect(view?.updatedAt).toBe(created.createdAt);
      expect(Date.parse(view?.updatedAt ?? '')).toBeGreaterThanOrEqual(Date.parse(created.createdAt));
    });

    it('should report false and touch no keys for unknown ids', async () => {
      const deletesBefore = h.backend?.calls.del;

      expect(await h.repository.updateConversation('conv_missing', userMessage('x', h.clock.now()))).toBe(false);
      expect(h.backend?.calls.del).toBe(deletesBefore);
    });
  });

  describe('deleteConversation', () => {
    it('should delete and invalidate both keys', async () => {
      const created = await h.repository.createConversation('user-1');
      await h.repository.getConversation(created.conversationId);
      await h.repository.getUserConversations('user-1');

      expect(await h.repository.deleteConversation(created.conversationId)).toBe(true);

      expect(h.backend?.entries.size).toBe(0);
      expect(await h.repository.getConversation(created.conversationId)).toBeNull();
      expect(await h.repository.getUserConversations('user-1')).toEqual([]);
    });

    it('should return false when nothing was deleted', async () => {
      expect(await h.repository.deleteConversation('conv_missing')).toBe(false);
    });
  });

  describe('findActiveConversation', () => {
    it('should return the newest non-completed conversation', async () => {
      h.store.docs.push(
        storedDoc({ conversationId: 'conv_done', updatedAt: new Date('2024-04-03T00:00:00.000Z') }),
        storedDoc({
          conversationId: 'conv_open',
          assessmentStage: 'gathering_info',
          updatedAt: new Date('2024-04-02T00:00:00.000Z'),
        })
      );

      expect((await h.repository.findActiveConversation('user-1'))?.conversationId).toBe('conv_open');
      expect(await h.repository.findActiveConversation('user-2')).toBeNull();
    });
  });

  describe('store failures', () => {
    it('should raise StoreUnavailableError when the store errors', async () => {
      h.store.failWith = new Error('connection terminated');

      const attempt = h.repository.getConversation('conv_any');

      await expect(attempt).rejects.toBeInstanceOf(StoreUnavailableError);
      await expect(attempt).rejects.toMatchObject({ statusCode: 503, code: 'STORE_UNAVAILABLE' });
    });

    it('should raise StoreUnavailableError when the store times out', async () => {
      const slow = createHarness({ storeTimeoutMs: 20 });
      slow.store.delayMs = 100;

      await expect(slow.repository.createConversation('user-1')).rejects.toBeInstanceOf(StoreUnavailableError);
    });

    it('should not let cache failures escape', async () => {
      const created = await h.repository.createConversation('user-1');
      if (h.backend) h.backend.failWith = new Error('READONLY');

      const view = await h.repository.getConversation(created.conversationId);
      expect(view?.conversationId).toBe(created.conversationId);
      expect(await h.repository.deleteConversation(created.conversationId)).toBe(true);
    });
  });

  describe('with the cache disabled', () => {
    it('should serve every read from the store and stay correct', async () => {
      const bare = createHarness({ cacheEnabled: false });

      const first = await bare.repository.createConversation('user-1');
      await bare.repository.updateConversation(first.conversationId, userMessage('hair loss', bare.clock.now()), {
        symptomsCollected: { hair_loss: { category: 'hair_conditions', mentioned: true } },
        assessmentStage: 'gathering_info',
      });

      bare.store.resetCalls();
      const a = await bare.repository.getConversation(first.conversationId);
      const b = await bare.repository.getConversation(first.conversationId);

      expect(a).toEqual(b);
      expect(bare.store.calls.findOne).toBe(2);
      expect(a?.symptomsCollected).toEqual({ hair_loss: { category: 'hair_conditions', mentioned: true } });

      const second = await bare.repository.createConversation('user-1');
      const list = await bare.repository.getUserConversations('user-1');
      expect(list.map((s) => s.conversationId).sort()).toEqual([first.conversationId, second.conversationId].sort());
      expect((await bare.repository.getConversation(first.conversationId))?.assessmentStage).toBe('completed');
    });
  });
});
