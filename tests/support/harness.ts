import { ConversationRepository } from '../../src/domain/conversation/repository';
import { SessionCache } from '../../src/domain/session/cache';
import { logger } from '../../src/infra/logging/logger';
import { MemoryCacheBackend, MemoryConversationStore } from './fakes';

export class TestClock {
  constructor(private current: number = Date.parse('2024-05-01T10:00:00.000Z')) {}

  now = (): Date => new Date(this.current);
  millis = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface Harness {
  clock: TestClock;
  store: MemoryConversationStore;
  backend: MemoryCacheBackend | null;
  cache: SessionCache;
  repository: ConversationRepository;
}

export function createHarness(options: { cacheEnabled?: boolean; storeTimeoutMs?: number; cacheTimeoutMs?: number } = {}): Harness {
  const clock = new TestClock();
  const store = new MemoryConversationStore();
  const backend = options.cacheEnabled === false ? null : new MemoryCacheBackend(clock.millis);
  const cache = new SessionCache(backend, { timeoutMs: options.cacheTimeoutMs ?? 50, logger });
  const repository = new ConversationRepository(store, cache, {
    storeTimeoutMs: options.storeTimeoutMs ?? 200,
    logger,
    now: clock.now,
  });

  return { clock, store, backend, cache, repository };
}
