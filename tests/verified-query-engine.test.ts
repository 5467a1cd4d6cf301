import { beforeEach, describe, expect, it } from 'vitest';
import { VerifiedQueryEngine } from '../src/services/relayer/query/VerifiedQueryEngine';
import { ChainStateQueries, encodeStoreValue } from '../src/services/relayer/query/ChainStateQueries';
import { paths } from '../src/services/relayer/query/paths';
import { err, ok } from '../src/types/result';
import { LATEST } from '../src/types/ibc';
import { SimulatedChain, createTestChain } from './helpers/mock-chain';
import type { FaultMode } from './helpers/mock-chain';
import type { ProofQueryFn } from '../src/services/relayer/query/VerifiedQueryEngine';
import type { ChannelEnd } from '../src/types/ibc';

const CHANNEL: ChannelEnd = {
    state: 'OPEN',
    ordering: 'UNORDERED',
    counterparty: { portId: 'transfer', channelId: 'channel-7' },
    connectionHops: ['connection-0'],
    version: 'ics20-1'
};

const CHANNEL_PATH = paths.channelEnd('transfer', 'channel-0');
const queryChannel: ProofQueryFn = (provider, _path, height) => provider.queryChannel('transfer', 'channel-0', height);
const AT_ONE = { revisionNumber: 1, revisionHeight: 1 };

function seededChain(): SimulatedChain {
    const sim = new SimulatedChain('chain-a-1');
    sim.set(CHANNEL_PATH, CHANNEL);
    sim.set(paths.nextSequenceSend('transfer', 'channel-0'), 4);
    sim.commit();
    return sim;
}

describe('VerifiedQueryEngine', () => {
    let sim: SimulatedChain;
    const engine = new VerifiedQueryEngine();

    beforeEach(() => {
        sim = seededChain();
    });

    it('fails over past two unreachable providers and returns the third one\'s verified value', async () => {
        const { chain, providers } = createTestChain(sim, '07-tendermint-0', ['transport', 'transport', 'honest']);

        const result = await engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.value).toEqual(encodeStoreValue(CHANNEL));
        expect(result.value.height).toEqual(AT_ONE);
        expect(chain.failoverCount).toBe(2);
        expect(chain.remainingProviders).toBe(0);
        expect(chain.provider).toBe(providers[2]);
        expect(providers.map(provider => provider.calls)).toEqual([1, 1, 1]);
    });

    const faults: FaultMode[] = ['transport', 'malformed', 'byzantine'];
    for (const fault of faults) {
        for (const k of [1, 2, 3]) {
            it(`performs exactly ${k} failover(s) when the first ${k} of 4 providers are ${fault}`, async () => {
                const modes: FaultMode[] = [...Array<FaultMode>(k).fill(fault), ...Array<FaultMode>(4 - k).fill('honest')];
                const { chain, providers } = createTestChain(sim, '07-tendermint-0', modes);

                const result = await engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE);

                expect(result.ok).toBe(true);
                expect(chain.failoverCount).toBe(k);
                expect(chain.provider).toBe(providers[k]);
                expect(chain.remainingProviders).toBe(3 - k);
            });
        }
    }

    it('returns NoAvailableProvider and leaves the pool empty when every provider fails', async () => {
        const { chain } = createTestChain(sim, '07-tendermint-0', ['transport', 'byzantine', 'malformed']);

        const result = await engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE);

        expect(result).toEqual(err({
            kind: 'NoAvailableProvider',
            chainId: 'chain-a-1',
            lastFault: 'malformed response'
        }));
        expect(chain.provider).toBeNull();
        expect(chain.remainingProviders).toBe(0);
        expect(chain.failoverCount).toBe(3);
    });

    it('returns NoAvailableProvider at once for a chain without providers', async () => {
        const { chain } = createTestChain(sim, '07-tendermint-0', []);

        const result = await engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE);

        expect(result).toEqual(err({ kind: 'NoAvailableProvider', chainId: 'chain-a-1', lastFault: undefined }));
    });

    it('treats a missing trusted root as terminal without dropping the provider', async () => {
        const { chain, verifier } = createTestChain(sim, '07-tendermint-0', ['honest', 'honest']);
        verifier.unavailable.add(1);

        const result = await engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE);

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toEqual({
            kind: 'LightClientUnavailable',
            chainId: 'chain-a-1',
            height: 1,
            reason: 'no trusted header at 1'
        });
        expect(chain.failoverCount).toBe(0);
        expect(chain.remainingProviders).toBe(1);
    });

    it('verifies proven absence', async () => {
        const { chain } = createTestChain(sim, '07-tendermint-0');
        const path = paths.packetReceipt('transfer', 'channel-0', 9);

        const result = await engine.query(
            chain,
            (provider, _path, height) => provider.queryPacketReceipt('transfer', 'channel-0', 9, height),
            path,
            AT_ONE
        );

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.value).toBeNull();
        expect(result.value.proof.type).toBe('non-membership');
    });

    it('reads at the provider\'s current height for LATEST', async () => {
        sim.commit();
        sim.commit();
        const { chain } = createTestChain(sim, '07-tendermint-0');

        const result = await engine.query(chain, queryChannel, CHANNEL_PATH, LATEST);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.height).toEqual({ revisionNumber: 1, revisionHeight: 3 });
    });

    it('counts a value the decoder rejects against the provider', async () => {
        const { chain } = createTestChain(sim, '07-tendermint-0', ['honest', 'honest']);

        const result = await engine.queryDecoded(chain, queryChannel, CHANNEL_PATH, AT_ONE, () => err('unexpected shape'));

        expect(result).toEqual(err({
            kind: 'NoAvailableProvider',
            chainId: 'chain-a-1',
            lastFault: 'malformed value: unexpected shape'
        }));
        expect(chain.failoverCount).toBe(2);
    });

    it('fails over once when concurrent queries observe the same faulty provider', async () => {
        const { chain, providers } = createTestChain(sim, '07-tendermint-0', ['transport', 'honest']);

        const [first, second] = await Promise.all([
            engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE),
            engine.query(chain, queryChannel, CHANNEL_PATH, AT_ONE)
        ]);

        expect(first.ok).toBe(true);
        expect(second.ok).toBe(true);
        expect(chain.failoverCount).toBe(1);
        expect(chain.provider).toBe(providers[1]);
    });

    it('fails over unverified lookups on thrown errors', async () => {
        const { chain, providers } = createTestChain(sim, '07-tendermint-0', ['transport', 'honest']);

        const result = await engine.queryUnverified(chain, provider => provider.getStatus(), 'status');

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.height).toBe(1);
        expect(chain.provider).toBe(providers[1]);
    });
});

describe('ChainStateQueries', () => {
    const queries = new ChainStateQueries(new VerifiedQueryEngine());

    it('decodes a proven channel end', async () => {
        const { chain } = createTestChain(seededChain(), '07-tendermint-0');

        const result = await queries.channel(chain, 'transfer', 'channel-0', AT_ONE);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.value).toEqual(CHANNEL);
    });

    it('reports a proven-absent channel as ChannelNotFound', async () => {
        const { chain } = createTestChain(seededChain(), '07-tendermint-0');

        const result = await queries.channel(chain, 'transfer', 'channel-3', AT_ONE);

        expect(result).toEqual(err({ kind: 'ChannelNotFound', chainId: 'chain-a-1', portId: 'transfer', channelId: 'channel-3' }));
    });

    it('reads sequence counters', async () => {
        const { chain } = createTestChain(seededChain(), '07-tendermint-0');

        const result = await queries.nextSequenceSend(chain, 'transfer', 'channel-0', AT_ONE);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.value).toBe(4);
    });

    it('rejects a stored value of the wrong shape as a provider fault', async () => {
        const sim = new SimulatedChain('chain-a-1');
        sim.set(CHANNEL_PATH, { state: 'OPEN' });
        sim.commit();
        const { chain } = createTestChain(sim, '07-tendermint-0', ['honest']);

        const result = await queries.channel(chain, 'transfer', 'channel-0', AT_ONE);

        expect(result).toEqual(err({
            kind: 'NoAvailableProvider',
            chainId: 'chain-a-1',
            lastFault: 'malformed value: not a channel end'
        }));
    });

    it('reports the chain clock in nanoseconds', async () => {
        const sim = seededChain();
        const { chain } = createTestChain(sim, '07-tendermint-0');

        const clock = await queries.currentClock(chain);

        expect(clock).toEqual(ok({
            height: { revisionNumber: 1, revisionHeight: 1 },
            timestampNs: BigInt(sim.timestampMs) * BigInt(1_000_000)
        }));
    });
});
