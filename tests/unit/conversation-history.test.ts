import { ConversationHistoryStore } from '../../src/memory/conversation-history';
import { ConfigurationError } from '../../src/config/errors';

describe('ConversationHistoryStore', () => {
  let store: ConversationHistoryStore;

  beforeEach(() => {
    store = new ConversationHistoryStore({ maxHistorySize: 3 });
  });

  afterEach(() => {
    store.stop();
  });

  it('should create a session lazily on first append', () => {
    expect(store.has('s1')).toBe(false);
    store.append('s1', { role: 'user', content: 'hello' });
    expect(store.has('s1')).toBe(true);
    expect(store.sessionCount).toBe(1);
  });

  it('should keep only the most recent turns, oldest evicted first', () => {
    for (let i = 1; i <= 5; i++) {
      store.append('s1', { role: 'user', content: `m${i}` });
    }
    const turns = store.get('s1');
    expect(turns).toHaveLength(3);
    expect(turns.map((t) => t.content)).toEqual(['m3', 'm4', 'm5']);
  });

  it('should hold length at min(N, max) after every append', () => {
    for (let n = 1; n <= 6; n++) {
      store.append('s1', { role: 'user', content: `m${n}` });
      expect(store.get('s1')).toHaveLength(Math.min(n, 3));
    }
  });

  it('should return a user then assistant turn in insertion order from a 2-turn window', () => {
    store.append('s1', { role: 'user', content: 'question' });
    store.append('s1', { role: 'assistant', content: 'answer' });
    const window = store.window('s1', 2);
    expect(window.map((t) => t.role)).toEqual(['user', 'assistant']);
    expect(window.map((t) => t.content)).toEqual(['question', 'answer']);
  });

  it('should return an empty window for unknown sessions or non-positive sizes', () => {
    expect(store.window('missing', 5)).toEqual([]);
    store.append('s1', { role: 'user', content: 'hi' });
    expect(store.window('s1', 0)).toEqual([]);
  });

  it('should freeze turns and their metadata', () => {
    const turn = store.append('s1', { role: 'user', content: 'hi', metadata: { channel: 'web' } });
    expect(Object.isFrozen(turn)).toBe(true);
    expect(Object.isFrozen(turn.metadata)).toBe(true);
    expect(turn.metadata).toEqual({ channel: 'web' });
  });

  it('should not let a backdated turn precede the previous one', () => {
    store.append('s1', { role: 'user', content: 'first', timestamp: 2_000 });
    const second = store.append('s1', { role: 'assistant', content: 'second', timestamp: 1_000 });
    expect(second.timestamp).toBe(2_000);
  });

  it('should keep sessions independent', () => {
    store.append('a', { role: 'user', content: 'for a' });
    store.append('b', { role: 'user', content: 'for b' });
    expect(store.get('a').map((t) => t.content)).toEqual(['for a']);
    expect(store.get('b').map((t) => t.content)).toEqual(['for b']);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new ConversationHistoryStore({ maxHistorySize: 0 })).toThrow(ConfigurationError);
  });

  describe('idle expiry', () => {
    it('should evict sessions idle longer than the TTL', () => {
      let clock = 0;
      const expiring = new ConversationHistoryStore({ maxHistorySize: 5, idleTtlMs: 1_000, now: () => clock });
      expiring.append('old', { role: 'user', content: 'x' });
      clock = 900;
      expiring.append('fresh', { role: 'user', content: 'y' });

      clock = 1_500;
      expect(expiring.evictIdle()).toBe(1);
      expect(expiring.has('old')).toBe(false);
      expect(expiring.has('fresh')).toBe(true);
    });

    it('should never evict a session with work in flight', async () => {
      let clock = 0;
      const expiring = new ConversationHistoryStore({ maxHistorySize: 5, idleTtlMs: 10, now: () => clock });
      expiring.append('busy', { role: 'user', content: 'x' });

      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const work = expiring.runExclusive('busy', () => gate);

      clock = 1_000;
      expect(expiring.evictIdle()).toBe(0);
      expect(expiring.has('busy')).toBe(true);

      release();
      await work;
      expect(expiring.evictIdle()).toBe(1);
    });

    it('should do nothing when expiry is disabled', () => {
      let clock = 0;
      const keep = new ConversationHistoryStore({ maxHistorySize: 5, now: () => clock });
      keep.append('s', { role: 'user', content: 'x' });
      clock = 10_000_000;
      expect(keep.evictIdle()).toBe(0);
    });
  });
});
