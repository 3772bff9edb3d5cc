import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { INVOICE_PROFILE, resolveProfile } from '../config/invoice-profile';
import { DraftStoreService } from './draft-store.service';

describe('DraftStoreService', () => {
  let store: DraftStoreService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DraftStoreService,
        { provide: INVOICE_PROFILE, useValue: resolveProfile('relaxed') },
        {
          provide: ConfigService,
          useValue: new ConfigService({ SESSION_HISTORY_LIMIT: 2 }),
        },
      ],
    }).compile();

    store = module.get<DraftStoreService>(DraftStoreService);
  });

  it('creates an empty draft on first access', () => {
    expect(store.peekSession('s1')).toBeUndefined();

    const session = store.getSession('s1');

    expect(session.phase).toBe('EMPTY');
    expect(session.history).toEqual([]);
    expect(session.draft).toEqual({
      currency: 'INR',
      taxPercent: 18,
      shippingFee: 0,
      discount: 0,
      items: [],
    });
    expect(store.getSession('s1')).toBe(session);
  });

  it('starts over after a reset', () => {
    store.saveDraft(
      's1',
      { ...store.emptyDraft(), customerName: 'Asha Rao' },
      'BLOCKED',
    );

    expect(store.resetSession('s1')).toBe(true);
    expect(store.resetSession('s1')).toBe(false);
    expect(store.getSession('s1').draft.customerName).toBeUndefined();
    expect(store.getSession('s1').phase).toBe('EMPTY');
  });

  it('keeps sessions apart', () => {
    store.saveDraft('a', { ...store.emptyDraft(), discount: 20 }, 'BLOCKED');

    expect(store.getSession('b').draft.discount).toBe(0);
    expect(store.size).toBe(2);
  });

  it('keeps only the most recent utterances', () => {
    store.appendHistory('s1', 'one');
    store.appendHistory('s1', 'two');
    store.appendHistory('s1', 'three');

    expect(store.getSession('s1').history).toEqual(['two', 'three']);
  });

  it('runs tasks of one session one at a time without blocking others', async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.runExclusive('a', async () => {
      order.push('first:start');
      await gate;
      order.push('first:end');
    });
    const second = store.runExclusive('a', async () => {
      order.push('second');
    });
    const other = store.runExclusive('b', async () => {
      order.push('other');
    });

    await other;
    expect(order).toEqual(['first:start', 'other']);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
  });

  it('releases the lock when a task fails', async () => {
    await expect(
      store.runExclusive('a', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(store.runExclusive('a', () => 'next')).resolves.toBe('next');
  });
});
