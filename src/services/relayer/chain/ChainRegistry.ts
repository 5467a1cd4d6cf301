import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import { revisionFromChainId } from '../../../types/ibc';
import type { Result } from '../../../types/result';
import type { ChainNotFoundError } from '../../../types/errors';
import type { ChainProvider } from '../../../clients/ChainProvider';
import type { LightClientAdapter } from '../light-client/LightClientAdapter';

export interface ChainDescriptor {
    chainId: string;
    /** Client hosted on this chain that tracks its counterparty. */
    clientId: string;
    /** Bech32 prefix of account addresses. */
    prefix: string;
    /** Gas price used when submitting datagrams, e.g. `0.025uatom`. */
    gasPrice: string;
}

export interface ProviderSnapshot {
    chainId: string;
    clientId: string;
    currentProvider: string | null;
    remainingProviders: string[];
    failovers: number;
}

/**
 * Mutable record of one relayed chain.
 *
 * The provider pool is private to the record and only changes through
 * `replaceProvider`. The replacement is a synchronous compare-and-replace, so
 * concurrent queries that observe the same faulty provider cause one failover,
 * not one each.
 */
export class Chain {
    public readonly chainId: string;
    public readonly clientId: string;
    public readonly prefix: string;
    public readonly gasPrice: string;
    public readonly revisionNumber: number;
    public readonly lightClient: LightClientAdapter;

    private current: ChainProvider | null;
    private readonly pool: ChainProvider[];
    private failovers = 0;

    constructor(descriptor: ChainDescriptor, providers: ChainProvider[], lightClient: LightClientAdapter) {
        this.chainId = descriptor.chainId;
        this.clientId = descriptor.clientId;
        this.prefix = descriptor.prefix;
        this.gasPrice = descriptor.gasPrice;
        this.revisionNumber = revisionFromChainId(descriptor.chainId);
        this.lightClient = lightClient;
        this.pool = [...providers];
        this.current = this.pool.shift() ?? null;
    }

    public get provider(): ChainProvider | null {
        return this.current;
    }

    public get remainingProviders(): number {
        return this.pool.length;
    }

    public get failoverCount(): number {
        return this.failovers;
    }

    /**
     * Drops `faulty` and promotes the head of the pool. When `faulty` was already
     * replaced by another caller the current provider is returned unchanged.
     */
    public replaceProvider(faulty: ChainProvider, reason: string): ChainProvider | null {
        if (this.current !== faulty) {
            return this.current;
        }

        this.current = this.pool.shift() ?? null;
        this.failovers++;

        logger.warn(`[Chain] Provider ${faulty.endpoint} for ${this.chainId} dropped: ${reason}`, {
            next: this.current?.endpoint ?? null,
            remaining: this.pool.length
        });

        return this.current;
    }

    public snapshot(): ProviderSnapshot {
        return {
            chainId: this.chainId,
            clientId: this.clientId,
            currentProvider: this.current?.endpoint ?? null,
            remainingProviders: this.pool.map(provider => provider.endpoint),
            failovers: this.failovers
        };
    }
}

export class ChainRegistry {
    private readonly chains: Map<string, Chain> = new Map();

    public register(chain: Chain): void {
        if (this.chains.has(chain.chainId)) {
            logger.warn(`[ChainRegistry] Replacing existing record for ${chain.chainId}`);
        }
        this.chains.set(chain.chainId, chain);
        logger.info(`[ChainRegistry] Registered chain ${chain.chainId}`, {
            provider: chain.provider?.endpoint ?? null,
            pool: chain.remainingProviders
        });
    }

    public get(chainId: string): Result<Chain, ChainNotFoundError> {
        const chain = this.chains.get(chainId);
        if (!chain) {
            return err({ kind: 'ChainNotFound', chainId });
        }
        return ok(chain);
    }

    public list(): Chain[] {
        return Array.from(this.chains.values());
    }
}
