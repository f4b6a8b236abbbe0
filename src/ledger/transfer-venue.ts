/**
 * Outbound payments of native coin and external tokens. Asynchronous and fallible.
 */
export interface TransferVenue {
  transfer(receiverId: string, assetId: string, amount: bigint): Promise<void>;
}

/** How an asset leaves the host account: a bank denom or a CW20 contract. */
export type AssetRoute = { kind: 'bank'; denom: string } | { kind: 'cw20'; contract: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRoute(assetId: string, value: unknown): AssetRoute {
  if (isRecord(value)) {
    if (value.kind === 'bank' && typeof value.denom === 'string' && value.denom) {
      return { kind: 'bank', denom: value.denom };
    }
    if (value.kind === 'cw20' && typeof value.contract === 'string' && value.contract) {
      return { kind: 'cw20', contract: value.contract };
    }
  }
  throw new Error(`Invalid transfer route for ${assetId}: ${JSON.stringify(value)}`);
}

/**
 * Parses `{ "<assetId>": { "kind": "bank", "denom": "..." } | { "kind": "cw20", "contract": "..." } }`.
 */
export function parseAssetRoutes(raw: unknown): Map<string, AssetRoute> {
  if (!isRecord(raw)) {
    throw new Error('Transfer routes must be a JSON object keyed by asset id');
  }
  return new Map(Object.entries(raw).map(([assetId, value]) => [assetId, parseRoute(assetId, value)]));
}
