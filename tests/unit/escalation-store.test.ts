import { InMemoryEscalationStore } from '../../src/escalation/escalation-store';
import { NewEscalationRecord } from '../../src/escalation/types';

const makeRecord = (overrides?: Partial<NewEscalationRecord>): NewEscalationRecord => ({
  userId: 'user-1',
  sessionId: 'session-1',
  reason: 'Negative sentiment detected',
  priority: 'high',
  suggestedAgent: 'customer_relations',
  conversationSnapshot: [{ role: 'user', content: 'this is awful!!', timestamp: 1 }],
  ...overrides,
});

describe('InMemoryEscalationStore', () => {
  let store: InMemoryEscalationStore;

  beforeEach(() => {
    store = new InMemoryEscalationStore();
  });

  it('should create pending records with an id', async () => {
    const record = await store.create(makeRecord());
    expect(record.id).toBeTruthy();
    expect(record.status).toBe('pending');
    expect(record.createdAt).toBe(record.updatedAt);
    expect(record.resolvedAt).toBeUndefined();
  });

  it('should list by status and priority, oldest first', async () => {
    const first = await store.create(makeRecord({ reason: 'first' }));
    await store.create(makeRecord({ reason: 'low one', priority: 'low' }));
    const third = await store.create(makeRecord({ reason: 'third' }));

    const high = await store.list('pending', 'high');
    expect(high.map((r) => r.id)).toEqual([first.id, third.id]);

    const all = await store.list('pending');
    expect(all).toHaveLength(3);
    expect(await store.list('resolved')).toEqual([]);
  });

  it('should respect the list limit', async () => {
    for (let i = 0; i < 4; i++) {
      await store.create(makeRecord({ reason: `r${i}` }));
    }
    const limited = await store.list('pending', undefined, 2);
    expect(limited.map((r) => r.reason)).toEqual(['r0', 'r1']);
  });

  it('should assign an agent without resolving', async () => {
    const record = await store.create(makeRecord());
    expect(await store.updateStatus(record.id, 'in_progress', 'agent-7')).toBe(true);

    const [updated] = await store.list('in_progress');
    expect(updated.assignedAgent).toBe('agent-7');
    expect(updated.resolvedAt).toBeUndefined();
  });

  it('should stamp resolution time and notes when resolved', async () => {
    const record = await store.create(makeRecord());
    expect(await store.updateStatus(record.id, 'resolved', undefined, 'Refund issued')).toBe(true);

    const [resolved] = await store.list('resolved');
    expect(resolved.resolvedAt).toBeDefined();
    expect(resolved.resolutionNotes).toBe('Refund issued');
    expect(await store.list('pending')).toEqual([]);
  });

  it('should report failure for an unknown id', async () => {
    expect(await store.updateStatus('missing', 'resolved')).toBe(false);
  });
});
