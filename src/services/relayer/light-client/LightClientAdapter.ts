import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import type { Result } from '../../../types/result';
import type { LightClientUnavailableError } from '../../../types/errors';
import type { Height } from '../../../types/ibc';

/**
 * A header that the light client has verified against its trusted validator set.
 */
export interface LightBlock {
    height: Height;
    /** Block time in nanoseconds since the epoch. */
    timestamp: string;
    /** Commitment root of the chain's provable store at this height. */
    root: string;
    nextValidatorsHash: string;
    /** Base64 encoded signed header, as submitted in a client update. */
    signedHeader: string;
}

/**
 * Header verification capability supplied by the embedding application.
 * Rejects when no header can be verified for the requested height.
 */
export interface HeaderVerifier {
    verifiedHeader(revisionHeight: number): Promise<LightBlock>;
}

export interface TrustedRoot {
    height: Height;
    root: string;
    timestamp: string;
}

/**
 * Per-chain view over a header verifier. Verified headers are recorded once per
 * height and never replaced.
 */
export class LightClientAdapter {
    private readonly consensusStates: Map<number, LightBlock> = new Map();

    constructor(
        private readonly chainId: string,
        private readonly verifier: HeaderVerifier,
        private readonly maxCachedHeights: number = 1000
    ) {}

    public async lightBlock(revisionHeight: number): Promise<Result<LightBlock, LightClientUnavailableError>> {
        const cached = this.consensusStates.get(revisionHeight);
        if (cached) {
            return ok(cached);
        }

        let block: LightBlock;
        try {
            block = await this.verifier.verifiedHeader(revisionHeight);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            logger.warn(`[LightClientAdapter] No verified header for ${this.chainId} at ${revisionHeight}: ${reason}`);
            return err({ kind: 'LightClientUnavailable', chainId: this.chainId, height: revisionHeight, reason });
        }

        if (block.height.revisionHeight !== revisionHeight) {
            return err({
                kind: 'LightClientUnavailable',
                chainId: this.chainId,
                height: revisionHeight,
                reason: `verifier returned header for height ${block.height.revisionHeight}`
            });
        }

        return ok(this.record(block));
    }

    public async trustedRoot(revisionHeight: number): Promise<Result<TrustedRoot, LightClientUnavailableError>> {
        const block = await this.lightBlock(revisionHeight);
        if (!block.ok) {
            return block;
        }
        const { height, root, timestamp } = block.value;
        return ok({ height, root, timestamp });
    }

    private record(block: LightBlock): LightBlock {
        const height = block.height.revisionHeight;
        // A concurrent lookup may have recorded this height first
        const existing = this.consensusStates.get(height);
        if (existing) {
            return existing;
        }

        this.consensusStates.set(height, block);
        if (this.consensusStates.size > this.maxCachedHeights) {
            const oldest = Math.min(...this.consensusStates.keys());
            this.consensusStates.delete(oldest);
        }
        return block;
    }
}
