import { describe, expect, it } from 'vitest';
import { ChainRegistry } from '../src/services/relayer/chain/ChainRegistry';
import { err } from '../src/types/result';
import { SimulatedChain, createTestChain } from './helpers/mock-chain';

describe('Chain', () => {
    it('starts on the first provider with the rest pooled in order', () => {
        const { chain } = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-0', ['honest', 'honest', 'honest']);

        expect(chain.revisionNumber).toBe(1);
        expect(chain.snapshot()).toEqual({
            chainId: 'chain-a-1',
            clientId: '07-tendermint-0',
            currentProvider: 'http://chain-a-1-p1.test',
            remainingProviders: ['http://chain-a-1-p2.test', 'http://chain-a-1-p3.test'],
            failovers: 0
        });
    });

    it('replaces a faulty provider with the head of the pool', () => {
        const { chain, providers } = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-0', ['honest', 'honest']);

        expect(chain.replaceProvider(providers[0], 'timeout')).toBe(providers[1]);
        expect(chain.failoverCount).toBe(1);
        expect(chain.remainingProviders).toBe(0);
    });

    it('ignores a replacement for a provider that is no longer current', () => {
        const { chain, providers } = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-0', ['honest', 'honest', 'honest']);

        chain.replaceProvider(providers[0], 'timeout');
        expect(chain.replaceProvider(providers[0], 'timeout')).toBe(providers[1]);
        expect(chain.failoverCount).toBe(1);
        expect(chain.remainingProviders).toBe(1);
    });

    it('runs out of providers', () => {
        const { chain, providers } = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-0', ['honest']);

        expect(chain.replaceProvider(providers[0], 'bad proof')).toBeNull();
        expect(chain.snapshot().currentProvider).toBeNull();
        expect(chain.failoverCount).toBe(1);
    });
});

describe('ChainRegistry', () => {
    it('looks chains up by id', () => {
        const registry = new ChainRegistry();
        const a = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-0').chain;
        const b = createTestChain(new SimulatedChain('chain-b-2'), '07-tendermint-1').chain;
        registry.register(a);
        registry.register(b);

        const found = registry.get('chain-b-2');
        expect(found.ok).toBe(true);
        if (!found.ok) return;
        expect(found.value).toBe(b);
        expect(found.value.revisionNumber).toBe(2);
        expect(registry.list()).toEqual([a, b]);
    });

    it('reports an unknown chain', () => {
        expect(new ChainRegistry().get('chain-z-9')).toEqual(err({ kind: 'ChainNotFound', chainId: 'chain-z-9' }));
    });

    it('replaces a record registered twice', () => {
        const registry = new ChainRegistry();
        const first = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-0').chain;
        const second = createTestChain(new SimulatedChain('chain-a-1'), '07-tendermint-5').chain;
        registry.register(first);
        registry.register(second);

        expect(registry.list()).toEqual([second]);
    });
});
