import { describe, expect, it } from 'vitest';
import { LightClientAdapter } from '../src/services/relayer/light-client/LightClientAdapter';
import { err, ok } from '../src/types/result';
import { SimulatedChain, StaticHeaderVerifier } from './helpers/mock-chain';
import type { HeaderVerifier, LightBlock } from '../src/services/relayer/light-client/LightClientAdapter';

function chainWithBlocks(count: number): SimulatedChain {
    const sim = new SimulatedChain('chain-a-1');
    for (let i = 0; i < count; i++) {
        sim.commit();
    }
    return sim;
}

describe('LightClientAdapter', () => {
    it('returns the verified root for a height', async () => {
        const sim = chainWithBlocks(2);
        const adapter = new LightClientAdapter('chain-a-1', new StaticHeaderVerifier(sim));

        const root = await adapter.trustedRoot(2);

        expect(root).toEqual(ok({
            height: { revisionNumber: 1, revisionHeight: 2 },
            root: sim.root(2),
            timestamp: sim.lightBlock(2).timestamp
        }));
    });

    it('records each verified header once', async () => {
        const sim = chainWithBlocks(1);
        const verifier = new StaticHeaderVerifier(sim);
        const adapter = new LightClientAdapter('chain-a-1', verifier);

        await adapter.lightBlock(1);
        await adapter.lightBlock(1);

        expect(verifier.calls).toBe(1);
    });

    it('evicts the oldest height beyond the cache size', async () => {
        const sim = chainWithBlocks(3);
        const verifier = new StaticHeaderVerifier(sim);
        const adapter = new LightClientAdapter('chain-a-1', verifier, 2);

        await adapter.lightBlock(1);
        await adapter.lightBlock(2);
        await adapter.lightBlock(3);
        await adapter.lightBlock(1);

        expect(verifier.calls).toBe(4);
    });

    it('reports a height the verifier cannot serve', async () => {
        const sim = chainWithBlocks(1);
        const verifier = new StaticHeaderVerifier(sim);
        verifier.unavailable.add(1);
        const adapter = new LightClientAdapter('chain-a-1', verifier);

        expect(await adapter.trustedRoot(1)).toEqual(err({
            kind: 'LightClientUnavailable',
            chainId: 'chain-a-1',
            height: 1,
            reason: 'no trusted header at 1'
        }));
    });

    it('rejects a header for another height', async () => {
        const sim = chainWithBlocks(2);
        const misdirected: HeaderVerifier = {
            verifiedHeader: async (): Promise<LightBlock> => sim.lightBlock(1)
        };
        const adapter = new LightClientAdapter('chain-a-1', misdirected);

        expect(await adapter.lightBlock(2)).toEqual(err({
            kind: 'LightClientUnavailable',
            chainId: 'chain-a-1',
            height: 2,
            reason: 'verifier returned header for height 1'
        }));
    });
});
