import { randomUUID } from 'crypto';
import { PendingActionNotFoundError } from '../errors';
import type {
  PendingAction,
  PendingActionFilter,
  PendingActionInput,
  PendingActionStatus,
} from './types';

export interface PendingActionPatch {
  status: PendingActionStatus;
  error?: string | null;
}

export interface PendingActionRepository {
  create(input: PendingActionInput, now: number): Promise<PendingAction>;
  get(id: string): Promise<PendingAction | null>;
  update(id: string, patch: PendingActionPatch, now: number): Promise<PendingAction>;
  list(filter?: PendingActionFilter): Promise<PendingAction[]>;
}

export class InMemoryPendingActionRepository implements PendingActionRepository {
  private readonly actions = new Map<string, PendingAction>();

  async create(input: PendingActionInput, now: number): Promise<PendingAction> {
    const action: PendingAction = {
      ...input,
      id: randomUUID(),
      status: 'pending',
      createdAt: now,
      updatedAt: now,
      error: null,
    };
    this.actions.set(action.id, action);
    return { ...action };
  }

  async get(id: string): Promise<PendingAction | null> {
    const action = this.actions.get(id);
    return action ? { ...action } : null;
  }

  async update(id: string, patch: PendingActionPatch, now: number): Promise<PendingAction> {
    const current = this.actions.get(id);
    if (!current) {
      throw new PendingActionNotFoundError(id);
    }
    const updated: PendingAction = {
      ...current,
      status: patch.status,
      error: patch.error === undefined ? current.error : patch.error,
      updatedAt: now,
    };
    this.actions.set(id, updated);
    return { ...updated };
  }

  async list(filter: PendingActionFilter = {}): Promise<PendingAction[]> {
    return [...this.actions.values()]
      .filter(
        (action) =>
          (filter.status === undefined || action.status === filter.status) &&
          (filter.accountId === undefined || action.accountId === filter.accountId) &&
          (filter.kind === undefined || action.kind === filter.kind)
      )
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((action) => ({ ...action }));
  }
}
