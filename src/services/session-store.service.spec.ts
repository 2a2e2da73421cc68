import { Test, TestingModule } from '@nestjs/testing';
import { KeyedMutex, SessionStoreService, SESSION_HISTORY_LIMIT } from './session-store.service';
import { NifiIntent, SessionEntry } from '../interfaces';

function entry(n: number): SessionEntry {
  return {
    timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, n)),
    rawQuery: `query ${n}`,
    intent: NifiIntent.LIST_PROCESSORS,
    confidence: 0.3,
    result: { success: true, message: `result ${n}` },
  };
}

describe('SessionStoreService', () => {
  let store: SessionStoreService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [SessionStoreService],
    }).compile();

    store = module.get<SessionStoreService>(SessionStoreService);
  });

  it('should default to ten entries per session', () => {
    expect(store.getHistoryLimit()).toBe(10);
  });

  it('should create a session on first append', async () => {
    expect(store.has('s1')).toBe(false);

    const record = await store.append('s1', entry(1));

    expect(record.sessionId).toBe('s1');
    expect(record.entries).toHaveLength(1);
    expect(store.size()).toBe(1);
  });

  it('should return an empty history for an unknown session', () => {
    expect(store.get('missing')).toEqual([]);
    expect(store.getRecord('missing')).toBeUndefined();
  });

  it('should keep the ten most recent entries in order', async () => {
    for (let n = 1; n <= 15; n++) {
      await store.append('s1', entry(n));
    }

    expect(store.get('s1').map((e) => e.rawQuery)).toEqual([
      'query 6',
      'query 7',
      'query 8',
      'query 9',
      'query 10',
      'query 11',
      'query 12',
      'query 13',
      'query 14',
      'query 15',
    ]);
  });

  it('should keep creation time across appends', async () => {
    const first = await store.append('s1', entry(1));
    const second = await store.append('s1', entry(2));
    expect(second.createdAt).toBe(first.createdAt);
  });

  it('should serialize concurrent appends to one session', async () => {
    await Promise.all(Array.from({ length: 12 }, (_, i) => store.append('s1', entry(i + 1))));

    const queries = store.get('s1').map((e) => e.rawQuery);
    expect(queries).toHaveLength(10);
    expect(queries[0]).toBe('query 3');
    expect(queries[9]).toBe('query 12');
  });

  it('should keep sessions independent', async () => {
    await Promise.all([store.append('a', entry(1)), store.append('b', entry(2)), store.append('a', entry(3))]);

    expect(store.get('a').map((e) => e.rawQuery)).toEqual(['query 1', 'query 3']);
    expect(store.get('b').map((e) => e.rawQuery)).toEqual(['query 2']);
  });

  it('should freeze stored entries', async () => {
    const original = entry(1);
    await store.append('s1', original);
    original.rawQuery = 'changed later';

    const [stored] = store.get('s1');
    expect(stored.rawQuery).toBe('query 1');
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(store.get('s1'))).toBe(true);
  });

  it('should keep the stored result apart from the caller', async () => {
    const original: SessionEntry = { ...entry(1), result: { success: true, message: 'orig', data: { count: 1 } } };
    await store.append('s1', original);

    original.result.message = 'mutated';
    if (original.result.data) original.result.data.count = 99;

    const [stored] = store.get('s1');
    expect(stored.result).toEqual({ success: true, message: 'orig', data: { count: 1 } });
    expect(Object.isFrozen(stored.result)).toBe(true);
    expect(Object.isFrozen(stored.result.data)).toBe(true);
  });

  it('should honour a configured limit', async () => {
    const module = await Test.createTestingModule({
      providers: [SessionStoreService, { provide: SESSION_HISTORY_LIMIT, useValue: 3 }],
    }).compile();
    const small = module.get<SessionStoreService>(SessionStoreService);

    for (let n = 1; n <= 5; n++) {
      await small.append('s1', entry(n));
    }

    expect(small.get('s1').map((e) => e.rawQuery)).toEqual(['query 3', 'query 4', 'query 5']);
  });

  it('should drop everything and refuse appends after shutdown', async () => {
    await store.append('s1', entry(1));

    store.shutdown();

    expect(store.size()).toBe(0);
    await expect(store.append('s1', entry(2))).rejects.toThrow('Session store has been shut down');
  });
});

describe('KeyedMutex', () => {
  it('should run tasks for one key in submission order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const slow = mutex.runExclusive('k', async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('first');
    });
    const fast = mutex.runExclusive('k', () => {
      order.push('second');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['first', 'second']);
  });

  it('should not hold one key behind another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const slow = mutex.runExclusive('a', async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('a');
    });
    const other = mutex.runExclusive('b', () => {
      order.push('b');
    });

    await Promise.all([slow, other]);
    expect(order).toEqual(['b', 'a']);
  });

  it('should keep the queue moving after a failed task', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('k', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive('k', () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('k')).toBe(false);
  });
});
