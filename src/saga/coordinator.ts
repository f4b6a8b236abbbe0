import { type AuthContext, requireRole } from '../auth/roles';
import {
  ExternalCallFailedError,
  PendingActionNotFoundError,
  isEngineError,
  toError,
} from '../errors';
import { EventBus } from '../events/bus';
import { type Clock, systemClock } from '../utils/clock';
import { logger } from '../utils/logger';
import type { PendingActionRepository } from './pending-actions';
import type {
  CompensatorMap,
  PendingAction,
  PendingActionFilter,
  PendingActionInput,
  PendingActionStatus,
  SettledOutcome,
} from './types';

function runCompensator(compensators: CompensatorMap, action: PendingAction): Promise<void> | void {
  switch (action.kind) {
    case 'buy':
      return requireCompensator(compensators.buy, action.kind)(action);
    case 'sell':
      return requireCompensator(compensators.sell, action.kind)(action);
    case 'treasuryWithdraw':
      return requireCompensator(compensators.treasuryWithdraw, action.kind)(action);
    case 'marketWithdraw':
      return requireCompensator(compensators.marketWithdraw, action.kind)(action);
  }
}

function requireCompensator<T>(compensator: T | undefined, kind: string): T {
  if (!compensator) {
    throw new Error(`No compensator registered for ${kind}`);
  }
  return compensator;
}

/**
 * Runs multi-step actions that straddle an asynchronous external call.
 *
 * A pending marker is persisted before the external step. When the step
 * fails, the compensator registered for the action's kind is run and the
 * marker is settled as compensated. A compensator that fails itself leaves
 * the marker `stuck` for `retryStuck` or owner resolution.
 */
export class SagaCoordinator {
  private readonly compensators: CompensatorMap = {};
  private poller: NodeJS.Timeout | null = null;

  constructor(
    private readonly repository: PendingActionRepository,
    private readonly events: EventBus,
    private readonly clock: Clock = systemClock
  ) {}

  registerCompensators(compensators: CompensatorMap): void {
    Object.assign(this.compensators, compensators);
  }

  async begin(input: PendingActionInput): Promise<PendingAction> {
    const action = await this.repository.create(input, this.clock());
    logger.debug('Pending action recorded', { id: action.id, kind: action.kind });
    return action;
  }

  /**
   * Applies the local mutations of recorded actions. The markers exist
   * before anything changes; when `mutate` throws nothing was applied, so the
   * actions are settled without running their compensators.
   */
  async apply<T>(actions: readonly PendingAction[], mutate: () => T): Promise<T> {
    try {
      return mutate();
    } catch (error) {
      for (const action of actions) {
        logger.warn('Pending action rejected before its external step', {
          id: action.id,
          kind: action.kind,
          error: toError(error).message,
        });
        await this.settle(action.id, 'compensated', toError(error).message);
      }
      throw error;
    }
  }

  /**
   * Runs the external step for a recorded action and settles it.
   * Engine errors from the step are rethrown as they are; anything else
   * surfaces as ExternalCallFailed.
   */
  async execute<T>(action: PendingAction, step: () => Promise<T>): Promise<T> {
    let result: T;
    try {
      result = await step();
    } catch (error) {
      logger.warn('External step failed, compensating', {
        id: action.id,
        kind: action.kind,
        error: toError(error).message,
      });
      await this.compensate(action, error);
      if (isEngineError(error)) {
        throw error;
      }
      throw new ExternalCallFailedError(`${action.kind} step`, error, { actionId: action.id });
    }
    await this.settle(action.id, 'committed');
    return result;
  }

  async get(id: string): Promise<PendingAction | null> {
    return this.repository.get(id);
  }

  async list(filter?: PendingActionFilter): Promise<PendingAction[]> {
    return this.repository.list(filter);
  }

  /**
   * Re-runs compensation for every stuck action. Returns how many settled.
   */
  async retryStuck(): Promise<number> {
    const stuck = await this.repository.list({ status: 'stuck' });
    let settled = 0;
    for (const action of stuck) {
      try {
        await runCompensator(this.compensators, action);
        await this.settle(action.id, 'compensated');
        settled += 1;
      } catch (error) {
        logger.error('Compensation retry failed', { id: action.id, kind: action.kind, error });
        await this.repository.update(
          action.id,
          { status: 'stuck', error: toError(error).message },
          this.clock()
        );
      }
    }
    return settled;
  }

  /**
   * Owner-triggered settlement of an action whose outcome is known out of band.
   */
  async resolve(auth: AuthContext, id: string, outcome: SettledOutcome): Promise<PendingAction> {
    requireRole(auth, 'owner');
    const action = await this.repository.get(id);
    if (!action || (action.status !== 'pending' && action.status !== 'stuck')) {
      throw new PendingActionNotFoundError(id);
    }
    if (outcome === 'compensated') {
      await runCompensator(this.compensators, action);
    }
    logger.info('Pending action resolved', { id, kind: action.kind, outcome, caller: auth.caller });
    return this.settle(id, outcome);
  }

  startRecoveryPoller(intervalMs: number): void {
    if (this.poller) return;
    this.poller = setInterval(() => {
      this.retryStuck().catch((error: unknown) => {
        logger.error('Saga recovery poller error', { error });
      });
    }, intervalMs);
  }

  stopRecoveryPoller(): void {
    if (this.poller) {
      clearInterval(this.poller);
      this.poller = null;
    }
  }

  private async compensate(action: PendingAction, cause: unknown): Promise<void> {
    try {
      await runCompensator(this.compensators, action);
    } catch (error) {
      logger.error('Compensation failed, action left for recovery', {
        id: action.id,
        kind: action.kind,
        error,
        cause: toError(cause).message,
      });
      await this.repository.update(
        action.id,
        { status: 'stuck', error: toError(error).message },
        this.clock()
      );
      return;
    }
    await this.settle(action.id, 'compensated', toError(cause).message);
  }

  private async settle(
    id: string,
    status: Extract<PendingActionStatus, SettledOutcome>,
    error?: string
  ): Promise<PendingAction> {
    const settled = await this.repository.update(id, { status, error }, this.clock());
    this.events.emit({
      action: 'saga_settled',
      actionId: id,
      kind: settled.kind,
      status,
      timestamp: settled.updatedAt,
    });
    return settled;
  }
}
