/**
 * Relayer Module
 * Wires chains, queries, datagram building and packet workers from configuration
 */

import { logger } from '../../utils/logger';
import { err, ok } from '../../types/result';
import { RestChainProvider } from '../../clients/RestChainProvider';
import { Chain, ChainRegistry } from './chain/ChainRegistry';
import { LightClientAdapter } from './light-client/LightClientAdapter';
import { VerifiedQueryEngine } from './query/VerifiedQueryEngine';
import { ChainStateQueries } from './query/ChainStateQueries';
import { PacketLifecycleTracker } from './packet/PacketLifecycleTracker';
import { DatagramBuilder } from './datagram/DatagramBuilder';
import { CosmjsDatagramSubmitter, SimulatedSubmitter } from './submit/DatagramSubmitter';
import { PacketWorker } from './worker/PacketWorker';
import type { Result } from '../../types/result';
import type { ChainNotFoundError } from '../../types/errors';
import type { ChainProvider } from '../../clients/ChainProvider';
import type { ChainConfig, RelayPathConfig, RelayerConfig } from '../../config/relayer-config';
import type { HeaderVerifier } from './light-client/LightClientAdapter';
import type { DatagramSubmitter } from './submit/DatagramSubmitter';
import type { PacketRelayPath } from './packet/PacketLifecycleTracker';
import type { PacketWorkerDependencies } from './worker/PacketWorker';

export interface RelayerModuleOptions {
    headerVerifierFor: (chain: ChainConfig) => HeaderVerifier;
    /** Defaults to a REST provider per endpoint. */
    providerFor?: (chain: ChainConfig, endpoint: string) => ChainProvider;
    /** Defaults to signing with the configured mnemonic, or simulating without one. */
    submitter?: DatagramSubmitter;
}

export function pathKey(path: RelayPathConfig): string {
    return `${path.sourceChainId}:${path.portId}/${path.channelId}->${path.destinationChainId}`;
}

export class RelayerModule {
    public readonly registry = new ChainRegistry();
    public readonly engine = new VerifiedQueryEngine();
    public readonly queries: ChainStateQueries;
    public readonly tracker: PacketLifecycleTracker;
    public readonly builder: DatagramBuilder;
    public readonly submitter: DatagramSubmitter;

    private readonly workers: Map<string, PacketWorker> = new Map();
    private started = false;

    constructor(private readonly config: RelayerConfig, options: RelayerModuleOptions) {
        this.queries = new ChainStateQueries(this.engine);
        this.tracker = new PacketLifecycleTracker(this.queries, this.engine);
        this.builder = new DatagramBuilder(this.queries);
        this.submitter = options.submitter ?? (config.mnemonic
            ? new CosmjsDatagramSubmitter(config.mnemonic)
            : new SimulatedSubmitter());

        const providerFor = options.providerFor
            ?? ((chain: ChainConfig, endpoint: string) => new RestChainProvider(chain.chainId, endpoint, config.providerTimeoutMs));

        for (const chainConfig of config.chains) {
            const providers = chainConfig.providers.map(endpoint => providerFor(chainConfig, endpoint));
            const lightClient = new LightClientAdapter(chainConfig.chainId, options.headerVerifierFor(chainConfig));
            this.registry.register(new Chain(chainConfig, providers, lightClient));
        }

        for (const path of config.paths) {
            const worker = this.createWorker(path);
            if (!worker.ok) {
                // Paths are validated against the chain list when the config is loaded
                logger.error(`[RelayerModule] Skipping path ${pathKey(path)}: chain ${worker.error.chainId} is not registered`);
            }
        }

        if (!config.mnemonic && !options.submitter) {
            logger.warn('[RelayerModule] RELAYER_MNEMONIC is not set; datagrams will be simulated, not broadcast');
        }
    }

    public get dependencies(): PacketWorkerDependencies {
        return {
            engine: this.engine,
            queries: this.queries,
            tracker: this.tracker,
            builder: this.builder,
            submitter: this.submitter
        };
    }

    public relayPath(path: RelayPathConfig): Result<PacketRelayPath, ChainNotFoundError> {
        const source = this.registry.get(path.sourceChainId);
        if (!source.ok) {
            return source;
        }
        const destination = this.registry.get(path.destinationChainId);
        if (!destination.ok) {
            return destination;
        }
        return ok({ source: source.value, destination: destination.value, portId: path.portId, channelId: path.channelId });
    }

    /** Worker of a configured path; only the paths in the config are relayed. */
    public workerFor(path: RelayPathConfig): PacketWorker | undefined {
        return this.workers.get(pathKey(path));
    }

    private createWorker(path: RelayPathConfig): Result<PacketWorker, ChainNotFoundError> {
        const key = pathKey(path);
        const existing = this.workers.get(key);
        if (existing) {
            return ok(existing);
        }

        const relayPath = this.relayPath(path);
        if (!relayPath.ok) {
            return err(relayPath.error);
        }

        const worker = new PacketWorker(relayPath.value, this.dependencies, this.config.worker);
        this.workers.set(key, worker);
        logger.info(`[RelayerModule] Created worker ${worker.name}`);
        return ok(worker);
    }

    public listWorkers(): PacketWorker[] {
        return Array.from(this.workers.values());
    }

    public start(): void {
        if (this.started) {
            logger.info('[RelayerModule] Already started');
            return;
        }
        this.started = true;
        for (const worker of this.workers.values()) {
            worker.start(this.config.pollIntervalMs);
        }
        logger.info(`[RelayerModule] Started ${this.workers.size} worker(s)`);
    }

    public stop(): void {
        for (const worker of this.workers.values()) {
            worker.stop();
        }
        if (this.submitter instanceof CosmjsDatagramSubmitter) {
            this.submitter.disconnect();
        }
        this.started = false;
        logger.info('[RelayerModule] Stopped');
    }
}
