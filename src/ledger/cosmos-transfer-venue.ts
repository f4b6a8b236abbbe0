import type { SigningCosmWasmClient } from '@cosmjs/cosmwasm-stargate';
import { assertIsDeliverTxSuccess } from '@cosmjs/stargate';
import { UnknownAssetError } from '../errors';
import { getSigningClient } from '../utils/blockchain';
import { logger } from '../utils/logger';
import type { AssetRoute, TransferVenue } from './transfer-venue';

export interface TransferSigner {
  client: Pick<SigningCosmWasmClient, 'sendTokens' | 'execute'>;
  /** Host account the payouts are sent from. */
  address: string;
}

/**
 * Pays out from the host account on a Cosmos chain: bank sends for native
 * denoms, `transfer` executions for CW20 tokens.
 */
export class CosmosTransferVenue implements TransferVenue {
  constructor(
    private readonly routes: ReadonlyMap<string, AssetRoute>,
    private readonly connect: () => Promise<TransferSigner> = getSigningClient,
    private readonly memo = 'stable-core payout'
  ) {}

  async transfer(receiverId: string, assetId: string, amount: bigint): Promise<void> {
    const route = this.routes.get(assetId);
    if (!route) {
      throw new UnknownAssetError(assetId);
    }
    const { client, address } = await this.connect();

    if (route.kind === 'bank') {
      const result = await client.sendTokens(
        address,
        receiverId,
        [{ denom: route.denom, amount: amount.toString() }],
        'auto',
        this.memo
      );
      assertIsDeliverTxSuccess(result);
      logger.info('Bank transfer sent', {
        receiverId,
        assetId,
        amount: amount.toString(),
        txHash: result.transactionHash,
      });
      return;
    }

    const result = await client.execute(
      address,
      route.contract,
      { transfer: { recipient: receiverId, amount: amount.toString() } },
      'auto',
      this.memo
    );
    logger.info('Token transfer sent', {
      receiverId,
      assetId,
      amount: amount.toString(),
      txHash: result.transactionHash,
    });
  }
}
