import { Mutex } from 'async-mutex';
import { logger } from '../../../utils/logger';
import { err, ok } from '../../../types/result';
import { compareHeights, formatHeight } from '../../../types/ibc';
import { describeError } from '../../../types/errors';
import type { Result } from '../../../types/result';
import type { Height } from '../../../types/ibc';
import type { RelayerError } from '../../../types/errors';
import type { Chain } from '../chain/ChainRegistry';
import type { ChainStateQueries } from '../query/ChainStateQueries';
import type { VerifiedQueryEngine } from '../query/VerifiedQueryEngine';
import type { PacketLifecycleTracker, PacketRelayPath } from '../packet/PacketLifecycleTracker';
import type { DatagramBuilder } from '../datagram/DatagramBuilder';
import type { DatagramSubmitter } from '../submit/DatagramSubmitter';
import type { Datagram, PacketDatagram, RelayEvent } from '../datagram/types';

export type WorkerCommand =
    | { type: 'NewBlock'; height: Height }
    | { type: 'ClearPendingPackets' }
    | { type: 'PacketEvents'; events: RelayEvent[] };

export interface PacketWorkerOptions {
    /** Clear every `clearInterval` source blocks; 0 disables periodic clearing. */
    clearInterval: number;
    /** Clear on the first new block. */
    clearOnStart: boolean;
    /** Upper bound on sequences inspected by one clearing pass. */
    maxPacketsPerClear: number;
}

export interface PacketWorkerDependencies {
    engine: VerifiedQueryEngine;
    queries: ChainStateQueries;
    tracker: PacketLifecycleTracker;
    builder: DatagramBuilder;
    submitter: DatagramSubmitter;
}

export interface PacketRelayFailure {
    sequence: number | null;
    kind: string;
    message: string;
}

export interface RelaySummary {
    recvPackets: number;
    acknowledgements: number;
    timeouts: number;
    clientUpdates: number;
    txHashes: string[];
    errors: PacketRelayFailure[];
}

export type WorkerState = 'idle' | 'running' | 'stopped' | 'failed';

export interface WorkerStatus {
    path: string;
    state: WorkerState;
    pendingCommands: number;
    clearOnStart: boolean;
    lastHeight: Height | null;
    fatalError: string | null;
}

export function shouldClearPackets(clearInterval: number, height: number): boolean {
    return clearInterval !== 0 && height % clearInterval === 0;
}

/** Errors that end the current command; it is retried on the next step. */
const COMMAND_ERRORS: ReadonlySet<RelayerError['kind']> = new Set<RelayerError['kind']>([
    'NoAvailableProvider',
    'LightClientUnavailable',
    'ClientUpdateStalled',
    'ClientFrozen',
    'ChainNotFound'
]);

function emptySummary(): RelaySummary {
    return { recvPackets: 0, acknowledgements: 0, timeouts: 0, clientUpdates: 0, txHashes: [], errors: [] };
}

function sequenceOf(event: RelayEvent): number | null {
    return 'packet' in event ? event.packet.sequence : null;
}

interface TargetBatch {
    target: Chain;
    datagrams: PacketDatagram[];
}

/**
 * State of one command run: the proof height chosen per chain, the datagrams
 * waiting to be submitted per target chain and the running summary.
 */
class RelayPass {
    public readonly summary: RelaySummary = emptySummary();
    public readonly heights: Map<string, Height> = new Map();
    public readonly batches: Map<string, TargetBatch> = new Map();

    public queue(target: Chain, datagram: PacketDatagram): void {
        const batch = this.batches.get(target.chainId) ?? { target, datagrams: [] };
        batch.datagrams.push(datagram);
        this.batches.set(target.chainId, batch);
    }

    public fail(sequence: number | null, error: RelayerError): void {
        this.summary.errors.push({ sequence, kind: error.kind, message: describeError(error) });
    }
}

/**
 * Relays packets along one path. Commands are queued and handled one at a
 * time; a command that fails stays at the head of the queue and is retried on
 * the next step. A frozen client stops the worker. Commands and direct
 * clearing requests run one at a time.
 */
export class PacketWorker {
    private readonly queue: WorkerCommand[] = [];
    private clearOnStart: boolean;
    private state: WorkerState = 'idle';
    private fatalError: RelayerError | null = null;
    private lastHeight: Height | null = null;
    // Unordered channels: every sequence below this one is known to be settled
    private lowWatermark = 1;
    private timer: NodeJS.Timeout | null = null;
    private polling = false;
    private readonly mutex = new Mutex();

    constructor(
        public readonly path: PacketRelayPath,
        private readonly deps: PacketWorkerDependencies,
        private readonly options: PacketWorkerOptions
    ) {
        this.clearOnStart = options.clearOnStart;
    }

    public get name(): string {
        return `${this.path.source.chainId}:${this.path.portId}/${this.path.channelId}->${this.path.destination.chainId}`;
    }

    public status(): WorkerStatus {
        return {
            path: this.name,
            state: this.state,
            pendingCommands: this.queue.length,
            clearOnStart: this.clearOnStart,
            lastHeight: this.lastHeight,
            fatalError: this.fatalError ? describeError(this.fatalError) : null
        };
    }

    public enqueue(command: WorkerCommand): void {
        if (this.state === 'failed' || this.state === 'stopped') {
            logger.warn(`[PacketWorker] ${this.name} is ${this.state}; dropping ${command.type}`);
            return;
        }
        this.queue.push(command);
    }

    /**
     * Handles the command at the head of the queue. Resolves to null when
     * there was nothing to do.
     */
    public async step(): Promise<Result<RelaySummary | null, RelayerError>> {
        const command = this.queue[0];
        if (!command || this.state === 'failed' || this.state === 'stopped') {
            return ok(null);
        }

        const result = await this.handleCommand(command);
        if (result.ok) {
            this.queue.shift();
            return result;
        }

        if (result.error.kind === 'ClientFrozen') {
            this.fail(result.error);
        } else {
            logger.warn(`[PacketWorker] ${command.type} on ${this.name} failed, will retry: ${describeError(result.error)}`);
        }
        return result;
    }

    public handleCommand(command: WorkerCommand): Promise<Result<RelaySummary | null, RelayerError>> {
        return this.mutex.runExclusive(() => this.dispatch(command));
    }

    private async dispatch(command: WorkerCommand): Promise<Result<RelaySummary | null, RelayerError>> {
        switch (command.type) {
            case 'NewBlock': {
                if (!this.lastHeight || compareHeights(command.height, this.lastHeight) > 0) {
                    this.lastHeight = command.height;
                }
                if (!this.clearOnStart && !shouldClearPackets(this.options.clearInterval, command.height.revisionHeight)) {
                    return ok(null);
                }
                const cleared = await this.clear();
                if (cleared.ok) {
                    this.clearOnStart = false;
                }
                return cleared;
            }
            case 'ClearPendingPackets':
                return this.clear();
            case 'PacketEvents':
                return this.relayBatch(command.events);
        }
    }

    /**
     * Relays every pending packet of the path: receives for packets not yet
     * received, acknowledgements written but not relayed back and timeouts.
     */
    public clearPendingPackets(): Promise<Result<RelaySummary, RelayerError>> {
        return this.mutex.runExclusive(() => this.clear());
    }

    private async clear(): Promise<Result<RelaySummary, RelayerError>> {
        const { source, destination, portId, channelId } = this.path;

        const channel = await this.deps.queries.channel(source, portId, channelId, 'latest');
        if (!channel.ok) {
            return channel;
        }
        const sequences = await this.deps.tracker.channelSequences(source, portId, channelId, channel.value.height);
        if (!sequences.ok) {
            return sequences;
        }

        const ordered = channel.value.value.ordering === 'ORDERED';
        const first = ordered ? sequences.value.nextSequenceAck : Math.max(this.lowWatermark, 1);
        const last = Math.min(sequences.value.nextSequenceSend - 1, first + this.options.maxPacketsPerClear - 1);
        if (last < first) {
            logger.debug(`[PacketWorker] No pending packets on ${this.name}`);
            return ok(emptySummary());
        }

        const range = Array.from({ length: last - first + 1 }, (_, index) => first + index);
        logger.info(`[PacketWorker] Clearing sequences ${first}..${last} on ${this.name}`);

        const sent = await this.deps.engine.queryUnverified(
            source,
            provider => provider.querySendPacketEvents(portId, channelId, range),
            'send_packet events'
        );
        if (!sent.ok) {
            return sent;
        }

        const pass = new RelayPass();
        const acknowledged: number[] = [];
        const events = [...sent.value].sort((a, b) => a.packet.sequence - b.packet.sequence);

        for (const event of events) {
            const status = await this.deps.tracker.classify(this.path, event);
            if (!status.ok) {
                if (COMMAND_ERRORS.has(status.error.kind)) {
                    return status;
                }
                pass.fail(event.packet.sequence, status.error);
                continue;
            }

            if (!status.value.commitmentPresent && event.packet.sequence === this.lowWatermark) {
                this.lowWatermark++;
            }

            let outcome: Result<void, RelayerError> = ok(undefined);
            switch (status.value.action) {
                case 'NeedsRecv':
                    outcome = await this.relay({ type: 'SendPacket', ...event }, source, destination, pass);
                    break;
                case 'NeedsTimeout':
                    outcome = await this.relay({ type: 'TimeoutCondition', ...event }, destination, source, pass);
                    break;
                case 'NeedsAck':
                    acknowledged.push(event.packet.sequence);
                    break;
                case 'NoActionNeeded':
                    break;
            }
            if (!outcome.ok) {
                return outcome;
            }
        }

        if (acknowledged.length > 0) {
            const acks = await this.deps.engine.queryUnverified(
                destination,
                provider => provider.queryWriteAcknowledgementEvents(
                    events[0].packet.destinationPort,
                    events[0].packet.destinationChannel,
                    acknowledged
                ),
                'write_acknowledgement events'
            );
            if (!acks.ok) {
                return acks;
            }
            for (const ack of acks.value) {
                const outcome = await this.relay({ type: 'WriteAcknowledgement', ...ack }, destination, source, pass);
                if (!outcome.ok) {
                    return outcome;
                }
            }
        }

        return this.flush(pass);
    }

    public relayEvents(events: RelayEvent[]): Promise<Result<RelaySummary, RelayerError>> {
        return this.mutex.runExclusive(() => this.relayBatch(events));
    }

    private async relayBatch(events: RelayEvent[]): Promise<Result<RelaySummary, RelayerError>> {
        const { source, destination } = this.path;
        const pass = new RelayPass();

        for (const event of events) {
            const outcome = event.type === 'WriteAcknowledgement' || event.type === 'TimeoutCondition'
                ? await this.relay(event, destination, source, pass)
                : await this.relay(event, source, destination, pass);
            if (!outcome.ok) {
                return outcome;
            }
        }

        return this.flush(pass);
    }

    /**
     * Builds the datagram for `event`, submitting a client update first when
     * the target needs one. Per-packet failures are recorded in the pass.
     */
    private async relay(event: RelayEvent, proofChain: Chain, target: Chain, pass: RelayPass): Promise<Result<void, RelayerError>> {
        const sequence = sequenceOf(event);

        let height = pass.heights.get(proofChain.chainId);
        if (!height) {
            const current = await this.deps.queries.currentHeight(proofChain);
            if (!current.ok) {
                return current;
            }
            height = current.value;
            pass.heights.set(proofChain.chainId, height);
        }

        let built = await this.deps.builder.createDatagram(event, proofChain, target, height);
        if (built.ok && built.value?.type === 'UpdateClient') {
            const update = built.value;
            const submitted = await this.submit(target, [update], pass, [sequence]);
            if (!submitted) {
                return ok(undefined);
            }
            pass.summary.clientUpdates++;

            built = await this.deps.builder.createDatagram(event, proofChain, target, height);
            if (built.ok && built.value?.type === 'UpdateClient') {
                return err({ kind: 'ClientUpdateStalled', chainId: target.chainId, clientId: update.clientId, targetHeight: height.revisionHeight });
            }
        }

        if (!built.ok) {
            if (COMMAND_ERRORS.has(built.error.kind)) {
                return built;
            }
            pass.fail(sequence, built.error);
            return ok(undefined);
        }

        const datagram = built.value;
        if (datagram === null) {
            return ok(undefined);
        }
        if (datagram.type === 'RecvPacket' || datagram.type === 'Acknowledgement' || datagram.type === 'Timeout') {
            pass.queue(target, datagram);
        } else if (datagram.type !== 'UpdateClient') {
            // Handshake steps are submitted on their own
            await this.submit(target, [datagram], pass, [sequence]);
        }
        return ok(undefined);
    }

    private async flush(pass: RelayPass): Promise<Result<RelaySummary, RelayerError>> {
        for (const { target, datagrams } of pass.batches.values()) {
            const submitted = await this.submit(target, datagrams, pass, datagrams.map(datagram => datagram.packet.sequence));
            if (!submitted) {
                continue;
            }
            for (const datagram of datagrams) {
                switch (datagram.type) {
                    case 'RecvPacket':
                        pass.summary.recvPackets++;
                        break;
                    case 'Acknowledgement':
                        pass.summary.acknowledgements++;
                        break;
                    case 'Timeout':
                        pass.summary.timeouts++;
                        break;
                }
            }
        }

        const { summary } = pass;
        logger.info(`[PacketWorker] Relay pass on ${this.name} finished`, {
            recvPackets: summary.recvPackets,
            acknowledgements: summary.acknowledgements,
            timeouts: summary.timeouts,
            clientUpdates: summary.clientUpdates,
            errors: summary.errors.length
        });
        return ok(summary);
    }

    private async submit(target: Chain, datagrams: Datagram[], pass: RelayPass, sequences: Array<number | null>): Promise<boolean> {
        try {
            const txHash = await this.deps.submitter.submit(target, datagrams);
            pass.summary.txHashes.push(txHash);
            return true;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.logError(error, `[PacketWorker] Submission to ${target.chainId} failed`, { types: datagrams.map(d => d.type) });
            for (const sequence of sequences) {
                pass.summary.errors.push({ sequence, kind: 'SubmissionFailed', message });
            }
            return false;
        }
    }

    private fail(error: RelayerError): void {
        this.fatalError = error;
        this.state = 'failed';
        this.queue.length = 0;
        this.clearTimer();
        logger.error(`[PacketWorker] ${this.name} stopped: ${describeError(error)}`);
    }

    /**
     * Polls the source chain every `pollIntervalMs`, queueing a NewBlock command
     * per new height and draining the queue.
     */
    public start(pollIntervalMs: number): void {
        if (this.timer || this.state === 'failed') {
            return;
        }
        this.state = 'running';
        logger.info(`[PacketWorker] Starting ${this.name}, polling every ${pollIntervalMs}ms`);
        this.timer = setInterval(() => {
            this.poll().catch(error => logger.logError(error, `[PacketWorker] Poll of ${this.name} failed`));
        }, pollIntervalMs);
    }

    public stop(): void {
        this.clearTimer();
        if (this.state !== 'failed') {
            this.state = 'stopped';
        }
        logger.info(`[PacketWorker] Stopped ${this.name}`);
    }

    private clearTimer(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    public async poll(): Promise<void> {
        if (this.polling) {
            return;
        }
        this.polling = true;
        try {
            const current = await this.deps.queries.currentHeight(this.path.source);
            if (current.ok && (!this.lastHeight || compareHeights(current.value, this.lastHeight) > 0)) {
                logger.debug(`[PacketWorker] New block ${formatHeight(current.value)} on ${this.path.source.chainId}`);
                this.lastHeight = current.value;
                this.enqueue({ type: 'NewBlock', height: current.value });
            }

            while (this.queue.length > 0 && this.state === 'running') {
                const result = await this.step();
                if (!result.ok) {
                    break;
                }
            }
        } finally {
            this.polling = false;
        }
    }
}
