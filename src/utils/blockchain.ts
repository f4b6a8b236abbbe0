import { CosmWasmClient, SigningCosmWasmClient } from '@cosmjs/cosmwasm-stargate';
import { DirectSecp256k1HdWallet } from '@cosmjs/proto-signing';
import { GasPrice } from '@cosmjs/stargate';
import { logger } from './logger';
import { config } from '../config';

export interface SigningConnection {
  client: SigningCosmWasmClient;
  address: string;
}

let cosmWasmClient: CosmWasmClient | null = null;
let signingConnection: SigningConnection | null = null;

export async function getCosmWasmClient(): Promise<CosmWasmClient> {
  if (!cosmWasmClient) {
    try {
      cosmWasmClient = await CosmWasmClient.connect(config.oracle.rpcEndpoint);
      logger.info('CosmWasm client connected', {
        endpoint: config.oracle.rpcEndpoint,
      });
    } catch (error) {
      logger.error('Failed to connect CosmWasm client', { error });
      throw error;
    }
  }
  return cosmWasmClient;
}

/**
 * Signing client for the host account that pays out withdrawals.
 */
export async function getSigningClient(): Promise<SigningConnection> {
  if (!signingConnection) {
    if (!config.venue.mnemonic) {
      throw new Error('VENUE_MNEMONIC is required to send payouts');
    }
    try {
      const wallet = await DirectSecp256k1HdWallet.fromMnemonic(config.venue.mnemonic, {
        prefix: config.venue.addressPrefix,
      });
      const [account] = await wallet.getAccounts();
      if (!account) {
        throw new Error('Payout wallet has no accounts');
      }
      const client = await SigningCosmWasmClient.connectWithSigner(config.oracle.rpcEndpoint, wallet, {
        gasPrice: GasPrice.fromString(config.venue.gasPrice),
      });
      signingConnection = { client, address: account.address };
      logger.info('Signing client connected', {
        endpoint: config.oracle.rpcEndpoint,
        address: account.address,
      });
    } catch (error) {
      logger.error('Failed to connect signing client', { error });
      throw error;
    }
  }
  return signingConnection;
}

export async function disconnectClients(): Promise<void> {
  if (cosmWasmClient) {
    cosmWasmClient.disconnect();
    cosmWasmClient = null;
    logger.info('CosmWasm client disconnected');
  }
  if (signingConnection) {
    signingConnection.client.disconnect();
    signingConnection = null;
    logger.info('Signing client disconnected');
  }
}
