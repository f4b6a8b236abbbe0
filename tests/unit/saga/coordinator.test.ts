import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resolveAuthContext } from '../../../src/auth/roles';
import { EventBus } from '../../../src/events/bus';
import type { EngineEvent } from '../../../src/events/types';
import { SagaCoordinator } from '../../../src/saga/coordinator';
import { InMemoryPendingActionRepository } from '../../../src/saga/pending-actions';
import type { PendingActionInput } from '../../../src/saga/types';
import { UnknownAssetError } from '../../../src/errors';
import { ACCOUNTS, ASSETS, ManualClock, START_TIME, expectEngineError } from '../../helpers';

const roster = { owner: ACCOUNTS.owner, guardians: [ACCOUNTS.guardian] };

const withdrawal: PendingActionInput = {
  kind: 'marketWithdraw',
  accountId: ACCOUNTS.alice,
  assetId: ASSETS.usdt,
  amount: '500',
};

describe('SagaCoordinator', () => {
  let clock: ManualClock;
  let repository: InMemoryPendingActionRepository;
  let events: EngineEvent[];
  let saga: SagaCoordinator;
  let restore: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    clock = new ManualClock(START_TIME);
    repository = new InMemoryPendingActionRepository();
    const bus = new EventBus();
    events = [];
    bus.subscribe((event) => events.push(event));
    saga = new SagaCoordinator(repository, bus, clock.now);
    restore = vi.fn();
    saga.registerCompensators({ marketWithdraw: restore });
  });

  it('records a pending marker before the external step', async () => {
    const action = await saga.begin(withdrawal);
    expect(action).toMatchObject({ ...withdrawal, status: 'pending', error: null, createdAt: START_TIME });
    expect(await saga.get(action.id)).toEqual(action);
  });

  it('commits when the step succeeds', async () => {
    const action = await saga.begin(withdrawal);
    clock.tick(5);
    await expect(saga.execute(action, async () => 'done')).resolves.toBe('done');

    const settled = await saga.get(action.id);
    expect(settled?.status).toBe('committed');
    expect(settled?.updatedAt).toBe(START_TIME + 5);
    expect(restore).not.toHaveBeenCalled();
    expect(events).toEqual([
      { action: 'saga_settled', actionId: action.id, kind: 'marketWithdraw', status: 'committed', timestamp: START_TIME + 5 },
    ]);
  });

  it('compensates and wraps a plain failure', async () => {
    const action = await saga.begin(withdrawal);
    await expectEngineError(
      () =>
        saga.execute(action, async () => {
          throw new Error('receiver rejected');
        }),
      'ExternalCallFailed'
    );

    expect(restore).toHaveBeenCalledWith(action);
    const settled = await saga.get(action.id);
    expect(settled?.status).toBe('compensated');
    expect(settled?.error).toBe('receiver rejected');
  });

  it('applies local changes after the markers exist', async () => {
    const action = await saga.begin(withdrawal);
    await expect(saga.apply([action], () => 42)).resolves.toBe(42);
    expect((await saga.get(action.id))?.status).toBe('pending');
    expect(events).toEqual([]);
  });

  it('settles every marker without compensating when the local change is refused', async () => {
    const first = await saga.begin(withdrawal);
    const second = await saga.begin({ ...withdrawal, assetId: ASSETS.eth });
    await expectEngineError(
      () =>
        saga.apply([first, second], () => {
          throw new UnknownAssetError(ASSETS.eth);
        }),
      'UnknownAsset'
    );

    expect(restore).not.toHaveBeenCalled();
    expect((await saga.get(first.id))?.status).toBe('compensated');
    expect((await saga.get(second.id))?.status).toBe('compensated');
    expect(events.map((event) => event.action)).toEqual(['saga_settled', 'saga_settled']);
  });

  it('rethrows engine errors from the step unchanged', async () => {
    const action = await saga.begin(withdrawal);
    const failure = new UnknownAssetError(ASSETS.usdt);
    await expect(
      saga.execute(action, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
    expect((await saga.get(action.id))?.status).toBe('compensated');
  });

  it('leaves an action stuck when compensation fails, then retries it', async () => {
    restore.mockImplementationOnce(() => {
      throw new Error('store offline');
    });
    const action = await saga.begin(withdrawal);
    await expectEngineError(
      () =>
        saga.execute(action, async () => {
          throw new Error('receiver rejected');
        }),
      'ExternalCallFailed'
    );

    const stuck = await saga.list({ status: 'stuck' });
    expect(stuck.map((entry) => entry.id)).toEqual([action.id]);
    expect(stuck[0]?.error).toBe('store offline');

    expect(await saga.retryStuck()).toBe(1);
    expect(restore).toHaveBeenCalledTimes(2);
    expect((await saga.get(action.id))?.status).toBe('compensated');
    expect(await saga.retryStuck()).toBe(0);
  });

  it('keeps an action stuck while its retry keeps failing', async () => {
    restore.mockImplementation(() => {
      throw new Error('still offline');
    });
    const action = await saga.begin(withdrawal);
    await expectEngineError(
      () =>
        saga.execute(action, async () => {
          throw new Error('receiver rejected');
        }),
      'ExternalCallFailed'
    );

    expect(await saga.retryStuck()).toBe(0);
    expect((await saga.get(action.id))?.status).toBe('stuck');
  });

  describe('resolve', () => {
    it('lets the owner settle a pending action either way', async () => {
      const owner = resolveAuthContext(ACCOUNTS.owner, roster);
      const committed = await saga.begin(withdrawal);
      const compensated = await saga.begin(withdrawal);

      expect((await saga.resolve(owner, committed.id, 'committed')).status).toBe('committed');
      expect(restore).not.toHaveBeenCalled();

      expect((await saga.resolve(owner, compensated.id, 'compensated')).status).toBe('compensated');
      expect(restore).toHaveBeenCalledTimes(1);
    });

    it('refuses anyone but the owner', async () => {
      const action = await saga.begin(withdrawal);
      await expectEngineError(
        () => saga.resolve(resolveAuthContext(ACCOUNTS.guardian, roster), action.id, 'committed'),
        'Unauthorized'
      );
    });

    it('refuses unknown and already settled actions', async () => {
      const owner = resolveAuthContext(ACCOUNTS.owner, roster);
      await expectEngineError(() => saga.resolve(owner, 'missing', 'committed'), 'PendingActionNotFound');

      const action = await saga.begin(withdrawal);
      await saga.execute(action, async () => undefined);
      await expectEngineError(() => saga.resolve(owner, action.id, 'compensated'), 'PendingActionNotFound');
    });
  });

  it('runs retries on an interval until stopped', async () => {
    vi.useFakeTimers();
    try {
      const retry = vi.spyOn(saga, 'retryStuck').mockResolvedValue(0);
      saga.startRecoveryPoller(1_000);
      saga.startRecoveryPoller(1_000);
      await vi.advanceTimersByTimeAsync(3_000);
      expect(retry).toHaveBeenCalledTimes(3);

      saga.stopRecoveryPoller();
      await vi.advanceTimersByTimeAsync(3_000);
      expect(retry).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('InMemoryPendingActionRepository', () => {
  it('filters by status, account and kind in creation order', async () => {
    const repository = new InMemoryPendingActionRepository();
    const first = await repository.create(withdrawal, 1);
    const second = await repository.create({ ...withdrawal, accountId: ACCOUNTS.bob }, 2);
    await repository.create(
      { kind: 'buy', accountId: ACCOUNTS.alice, recipientId: ACCOUNTS.alice, nativeAmount: '1' },
      3
    );
    await repository.update(second.id, { status: 'committed' }, 4);

    expect((await repository.list()).length).toBe(3);
    expect((await repository.list({ kind: 'marketWithdraw' })).map((a) => a.id)).toEqual([first.id, second.id]);
    expect((await repository.list({ status: 'pending', accountId: ACCOUNTS.bob })).length).toBe(0);
    expect((await repository.list({ accountId: ACCOUNTS.alice, kind: 'buy' })).length).toBe(1);
  });

  it('returns copies', async () => {
    const repository = new InMemoryPendingActionRepository();
    const action = await repository.create(withdrawal, 1);
    action.status = 'stuck';
    expect((await repository.get(action.id))?.status).toBe('pending');
  });

  it('fails to update an unknown action', async () => {
    await expectEngineError(
      () => new InMemoryPendingActionRepository().update('missing', { status: 'committed' }, 1),
      'PendingActionNotFound'
    );
  });
});
