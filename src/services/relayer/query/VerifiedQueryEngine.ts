import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import { LATEST } from '../../../types/ibc';
import { parseProvenValue } from '../../../clients/ChainProvider';
import { verifyMembership, verifyNonMembership } from '../../../crypto/commitment-tree';
import type { Result } from '../../../types/result';
import type { Height, QueryHeight } from '../../../types/ibc';
import type { NoAvailableProviderError, QueryError } from '../../../types/errors';
import type { CommitmentProof } from '../../../crypto/commitment-tree';
import type { ChainProvider } from '../../../clients/ChainProvider';
import type { Chain } from '../chain/ChainRegistry';

/**
 * Reads one proven value from a provider. Resolves to the provider's raw
 * response; anything thrown is a transport failure.
 */
export type ProofQueryFn = (provider: ChainProvider, path: string, revisionHeight: number) => Promise<unknown>;

export interface Proven<T> {
    value: T;
    proof: CommitmentProof;
    height: Height;
}

/** Verified value bytes; `value` is null when absence at the path was proven. */
export type VerifiedValue = Proven<Uint8Array | null>;

/**
 * Interprets verified bytes. A rejected value counts against the provider that
 * served it, like any other malformed response.
 */
export type ValueDecoder<T> = (value: Uint8Array | null) => Result<T, string>;

type Attempt<T> =
    | { outcome: 'verified'; value: Proven<T> }
    | { outcome: 'fault'; reason: string }
    | { outcome: 'terminal'; error: QueryError };

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function describeFault(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Queries provable state through a chain's current provider and verifies it
 * against the light client's trusted root for the same height.
 *
 * Transport failures, malformed responses and proofs that do not verify are
 * provider faults: the provider is dropped and the query retried on the next
 * one. Every retry runs on a provider that was never used before, so a query
 * makes at most one attempt per provider the chain had when it started.
 */
export class VerifiedQueryEngine {
    public query(
        chain: Chain,
        queryFn: ProofQueryFn,
        path: string,
        height: QueryHeight
    ): Promise<Result<VerifiedValue, QueryError>> {
        return this.queryDecoded(chain, queryFn, path, height, value => ok(value));
    }

    public async queryDecoded<T>(
        chain: Chain,
        queryFn: ProofQueryFn,
        path: string,
        height: QueryHeight,
        decode: ValueDecoder<T>
    ): Promise<Result<Proven<T>, QueryError>> {
        const maxAttempts = chain.remainingProviders + 1;
        let lastFault: string | undefined;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const provider = chain.provider;
            if (!provider) {
                break;
            }

            const result = await this.attempt(chain, provider, queryFn, path, height, decode);
            switch (result.outcome) {
                case 'verified':
                    logger.debug(`[VerifiedQueryEngine] Verified ${path} on ${chain.chainId} at ${result.value.height.revisionHeight}`, {
                        provider: provider.endpoint,
                        attempt
                    });
                    return ok(result.value);
                case 'terminal':
                    logger.error(`[VerifiedQueryEngine] Query for ${path} on ${chain.chainId} abandoned`, { error: result.error });
                    return err(result.error);
                case 'fault':
                    lastFault = result.reason;
                    chain.replaceProvider(provider, `${path}: ${result.reason}`);
                    break;
            }
        }

        return this.exhausted(chain, lastFault);
    }

    /**
     * Runs an unproven lookup (current height, chain time, packet events) with
     * the same failover policy: any thrown error drops the provider.
     */
    public async queryUnverified<T>(
        chain: Chain,
        lookup: (provider: ChainProvider) => Promise<T>,
        description: string
    ): Promise<Result<T, NoAvailableProviderError>> {
        const maxAttempts = chain.remainingProviders + 1;
        let lastFault: string | undefined;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            const provider = chain.provider;
            if (!provider) {
                break;
            }

            try {
                return ok(await lookup(provider));
            } catch (error) {
                lastFault = describeFault(error);
                chain.replaceProvider(provider, `${description}: ${lastFault}`);
            }
        }

        return this.exhausted(chain, lastFault);
    }

    private exhausted(chain: Chain, lastFault: string | undefined): Result<never, NoAvailableProviderError> {
        logger.error(`[VerifiedQueryEngine] Provider pool for ${chain.chainId} exhausted`, { lastFault });
        return err({ kind: 'NoAvailableProvider', chainId: chain.chainId, lastFault });
    }

    private async attempt<T>(
        chain: Chain,
        provider: ChainProvider,
        queryFn: ProofQueryFn,
        path: string,
        height: QueryHeight,
        decode: ValueDecoder<T>
    ): Promise<Attempt<T>> {
        let queryHeight: Height;
        let raw: unknown;

        try {
            if (height === LATEST) {
                const status = await provider.getStatus();
                queryHeight = { revisionNumber: chain.revisionNumber, revisionHeight: status.height };
            } else {
                queryHeight = height;
            }
            raw = await queryFn(provider, path, queryHeight.revisionHeight);
        } catch (error) {
            return { outcome: 'fault', reason: `transport failure: ${describeFault(error)}` };
        }

        const response = parseProvenValue(raw);
        if (!response) {
            return { outcome: 'fault', reason: 'malformed response' };
        }
        if (response.value !== null && !BASE64.test(response.value)) {
            return { outcome: 'fault', reason: 'value is not base64' };
        }
        const value = response.value === null ? null : new Uint8Array(Buffer.from(response.value, 'base64'));

        const trusted = await chain.lightClient.trustedRoot(queryHeight.revisionHeight);
        if (!trusted.ok) {
            return { outcome: 'terminal', error: trusted.error };
        }

        const verified = value === null
            ? verifyNonMembership(trusted.value.root, path, response.proof)
            : verifyMembership(trusted.value.root, path, value, response.proof);
        if (!verified) {
            return { outcome: 'fault', reason: 'proof does not match trusted root' };
        }

        const decoded = decode(value);
        if (!decoded.ok) {
            return { outcome: 'fault', reason: `malformed value: ${decoded.error}` };
        }

        return { outcome: 'verified', value: { value: decoded.value, proof: response.proof, height: queryHeight } };
    }
}
