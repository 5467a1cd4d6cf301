import { createHash } from 'crypto';
import { DirectSecp256k1HdWallet } from '@cosmjs/proto-signing';
import { GasPrice, SigningStargateClient, calculateFee } from '@cosmjs/stargate';
import { logger } from '../../../utils/logger';
import { encodeDatagram } from './DatagramEncoder';
import type { Chain } from '../chain/ChainRegistry';
import type { Datagram } from '../datagram/types';

/**
 * Delivers datagrams to a chain in one transaction. Rejects when the
 * transaction cannot be built or the chain rejects it.
 */
export interface DatagramSubmitter {
    submit(chain: Chain, datagrams: Datagram[]): Promise<string>;
}

interface SigningSession {
    endpoint: string;
    client: SigningStargateClient;
    signer: string;
}

const GAS_ADJUSTMENT = 1.5;

/**
 * Signs with a mnemonic-derived account and broadcasts through the chain's
 * current provider endpoint.
 */
export class CosmjsDatagramSubmitter implements DatagramSubmitter {
    private readonly sessions: Map<string, SigningSession> = new Map();

    constructor(private readonly mnemonic: string) {}

    private async session(chain: Chain): Promise<SigningSession> {
        const provider = chain.provider;
        if (!provider) {
            throw new Error(`No provider left for ${chain.chainId}`);
        }

        const existing = this.sessions.get(chain.chainId);
        if (existing && existing.endpoint === provider.endpoint) {
            return existing;
        }
        existing?.client.disconnect();

        const wallet = await DirectSecp256k1HdWallet.fromMnemonic(this.mnemonic, { prefix: chain.prefix });
        const [account] = await wallet.getAccounts();
        const client = await SigningStargateClient.connectWithSigner(provider.endpoint, wallet, {
            gasPrice: GasPrice.fromString(chain.gasPrice)
        });

        const session = { endpoint: provider.endpoint, client, signer: account.address };
        this.sessions.set(chain.chainId, session);
        logger.info(`[CosmjsDatagramSubmitter] Connected to ${chain.chainId} via ${provider.endpoint} as ${account.address}`);
        return session;
    }

    public async submit(chain: Chain, datagrams: Datagram[]): Promise<string> {
        const { client, signer } = await this.session(chain);
        const messages = datagrams.map(datagram => encodeDatagram(datagram, signer));

        const gasEstimation = await client.simulate(signer, messages, '');
        const gasLimit = Math.round(gasEstimation * GAS_ADJUSTMENT);
        const fee = calculateFee(gasLimit, GasPrice.fromString(chain.gasPrice));

        logger.info(`[CosmjsDatagramSubmitter] Submitting ${messages.length} datagram(s) to ${chain.chainId}`, {
            types: datagrams.map(datagram => datagram.type),
            gasEstimation,
            gasLimit
        });

        const result = await client.signAndBroadcast(signer, messages, fee);
        if (result.code !== 0) {
            throw new Error(`Transaction failed with code ${result.code}: ${result.rawLog ?? ''}`);
        }

        logger.info(`[CosmjsDatagramSubmitter] Transaction ${result.transactionHash} included at ${result.height}`, {
            gasUsed: result.gasUsed,
            gasWanted: result.gasWanted
        });
        return result.transactionHash;
    }

    public disconnect(): void {
        for (const session of this.sessions.values()) {
            session.client.disconnect();
        }
        this.sessions.clear();
    }
}

/**
 * Records datagrams instead of broadcasting them. Used when no signing key is
 * configured; hashes are derived from the chain, a counter and the payload.
 */
export class SimulatedSubmitter implements DatagramSubmitter {
    public readonly submitted: Array<{ chainId: string; txHash: string; datagrams: Datagram[] }> = [];

    public async submit(chain: Chain, datagrams: Datagram[]): Promise<string> {
        const txHash = createHash('sha256')
            .update(`${chain.chainId}|${this.submitted.length}|${JSON.stringify(datagrams.map(datagram => datagram.type))}`)
            .digest('hex')
            .toUpperCase();
        this.submitted.push({ chainId: chain.chainId, txHash, datagrams });
        logger.info(`[SimulatedSubmitter] Recorded ${datagrams.length} datagram(s) for ${chain.chainId} as ${txHash}`);
        return txHash;
    }
}
