import { PubSub } from 'graphql-subscriptions';
import type { Engine } from '../../engine';
import type { EngineEvent } from '../../events/types';
import { logger } from '../../utils/logger';

export const pubsub = new PubSub();

// Event types
export const ASSET_UPDATED = 'ASSET_UPDATED';
export const POSITION_UPDATED = 'POSITION_UPDATED';

export const Subscription = {
  assetUpdated: {
    subscribe: (_: unknown, { assetId }: { assetId: string }) => {
      return pubsub.asyncIterator([`${ASSET_UPDATED}:${assetId}`]);
    },
  },

  positionUpdated: {
    subscribe: (_: unknown, { accountId }: { accountId: string }) => {
      return pubsub.asyncIterator([`${POSITION_UPDATED}:${accountId}`]);
    },
  },
};

function publish(trigger: string, payload: Record<string, unknown>): void {
  pubsub.publish(trigger, payload).catch((error: unknown) => {
    logger.error('Failed to publish subscription payload', { trigger, error });
  });
}

/**
 * Asset ids whose pools an engine event may have changed.
 */
export function affectedAssetIds(event: EngineEvent): string[] {
  switch (event.action) {
    case 'supply':
    case 'withdraw_started':
    case 'withdraw_failed':
    case 'borrow':
    case 'repay':
    case 'deposit_to_reserve':
    case 'asset_registered':
    case 'asset_updated':
    case 'asset_enabled':
    case 'asset_disabled':
      return [event.assetId];
    case 'liquidate':
      return [...new Set([...event.repaid, ...event.seized].map((entry) => entry.assetId))];
    case 'force_close':
      return [...new Set([...event.collateral, ...event.debt].map((entry) => entry.assetId))];
    default:
      return [];
  }
}

/**
 * Forwards engine events to GraphQL subscribers. Returns the unsubscribe handle.
 */
export function bridgeEngineEvents(engine: Engine): () => void {
  return engine.events.subscribe((event) => {
    for (const assetId of affectedAssetIds(event)) {
      publish(`${ASSET_UPDATED}:${assetId}`, { assetUpdated: engine.market.getAsset(assetId) });
    }

    switch (event.action) {
      case 'supply':
      case 'withdraw_started':
      case 'withdraw_succeeded':
      case 'withdraw_failed':
      case 'increase_collateral':
      case 'decrease_collateral':
      case 'borrow':
      case 'repay':
      case 'deposit_to_reserve':
        publish(`${POSITION_UPDATED}:${event.accountId}`, { positionUpdated: event });
        break;
      default:
        break;
    }
  });
}
