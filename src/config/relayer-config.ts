import dotenv from 'dotenv';
import { err, ok } from '../types/result';
import type { Result } from '../types/result';
import type { ChainDescriptor } from '../services/relayer/chain/ChainRegistry';
import type { PacketWorkerOptions } from '../services/relayer/worker/PacketWorker';

dotenv.config();

export interface ChainConfig extends ChainDescriptor {
    /** Endpoints in failover order. */
    providers: string[];
    /** Light client daemon serving verified headers for this chain. */
    lightClientUrl?: string;
}

export interface RelayPathConfig {
    sourceChainId: string;
    portId: string;
    channelId: string;
    destinationChainId: string;
}

export interface RelayerConfig {
    chains: ChainConfig[];
    paths: RelayPathConfig[];
    worker: PacketWorkerOptions;
    pollIntervalMs: number;
    providerTimeoutMs: number;
    port: number;
    /** Absent: datagrams are simulated instead of broadcast. */
    mnemonic?: string;
}

export interface ConfigError {
    readonly kind: 'InvalidConfig';
    readonly problems: string[];
}

export type Env = Record<string, string | undefined>;

/** `chain-a-1` reads its settings from `CHAIN_A_1_*`. */
export function chainEnvPrefix(chainId: string): string {
    return chainId.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

function splitList(value: string | undefined, separator: string): string[] {
    if (!value) return [];
    return value.split(separator).map(item => item.trim()).filter(item => item.length > 0);
}

class EnvReader {
    public readonly problems: string[] = [];

    constructor(private readonly env: Env) {}

    public required(key: string): string {
        const value = this.env[key]?.trim();
        if (!value) {
            this.problems.push(`${key} is required`);
            return '';
        }
        return value;
    }

    public optional(key: string): string | undefined {
        const value = this.env[key]?.trim();
        return value ? value : undefined;
    }

    public integer(key: string, defaultValue: number, min: number): number {
        const value = this.optional(key);
        if (value === undefined) return defaultValue;
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed < min) {
            this.problems.push(`${key} must be an integer >= ${min}, got "${value}"`);
            return defaultValue;
        }
        return parsed;
    }

    public boolean(key: string, defaultValue: boolean): boolean {
        const value = this.optional(key);
        if (value === undefined) return defaultValue;
        if (value === 'true' || value === '1') return true;
        if (value === 'false' || value === '0') return false;
        this.problems.push(`${key} must be true or false, got "${value}"`);
        return defaultValue;
    }
}

function readChain(reader: EnvReader, chainId: string): ChainConfig {
    const prefix = chainEnvPrefix(chainId);
    const providers = splitList(reader.optional(`${prefix}_PROVIDERS`), ',');
    if (providers.length === 0) {
        reader.problems.push(`${prefix}_PROVIDERS must list at least one endpoint`);
    }
    for (const endpoint of providers) {
        if (!/^https?:\/\//.test(endpoint)) {
            reader.problems.push(`${prefix}_PROVIDERS entry "${endpoint}" is not an http(s) URL`);
        }
    }

    return {
        chainId,
        providers,
        clientId: reader.required(`${prefix}_CLIENT_ID`),
        prefix: reader.required(`${prefix}_PREFIX`),
        gasPrice: reader.optional(`${prefix}_GAS_PRICE`) ?? `0.025u${chainId.split('-')[0]}`,
        lightClientUrl: reader.optional(`${prefix}_LIGHT_CLIENT_URL`)
    };
}

const PATH_ENTRY = /^([^:\s]+):([^/\s]+)\/([^:\s]+):([^:\s]+)$/;

function readPaths(reader: EnvReader, chainIds: Set<string>): RelayPathConfig[] {
    const paths: RelayPathConfig[] = [];
    for (const entry of splitList(reader.optional('RELAYER_PATHS'), ';')) {
        const match = PATH_ENTRY.exec(entry);
        if (!match) {
            reader.problems.push(`RELAYER_PATHS entry "${entry}" is not <source>:<port>/<channel>:<destination>`);
            continue;
        }
        const [, sourceChainId, portId, channelId, destinationChainId] = match;
        for (const chainId of [sourceChainId, destinationChainId]) {
            if (!chainIds.has(chainId)) {
                reader.problems.push(`RELAYER_PATHS entry "${entry}" names unknown chain ${chainId}`);
            }
        }
        if (sourceChainId === destinationChainId) {
            reader.problems.push(`RELAYER_PATHS entry "${entry}" relays a chain to itself`);
        }
        paths.push({ sourceChainId, portId, channelId, destinationChainId });
    }
    return paths;
}

/**
 * Reads the relayer settings from an environment record. Every problem is
 * collected so a misconfigured deployment reports them all at once.
 */
export function loadRelayerConfig(env: Env = process.env): Result<RelayerConfig, ConfigError> {
    const reader = new EnvReader(env);

    const chainIds = splitList(reader.optional('RELAYER_CHAINS'), ',');
    if (chainIds.length === 0) {
        reader.problems.push('RELAYER_CHAINS must list at least one chain id');
    }
    const unique = new Set(chainIds);
    if (unique.size !== chainIds.length) {
        reader.problems.push('RELAYER_CHAINS contains duplicate chain ids');
    }

    const chains = Array.from(unique).map(chainId => readChain(reader, chainId));
    const paths = readPaths(reader, unique);

    const config: RelayerConfig = {
        chains,
        paths,
        worker: {
            clearInterval: reader.integer('PACKET_CLEAR_INTERVAL', 100, 0),
            clearOnStart: reader.boolean('PACKET_CLEAR_ON_START', true),
            maxPacketsPerClear: reader.integer('PACKET_MAX_PER_CLEAR', 100, 1)
        },
        pollIntervalMs: reader.integer('PACKET_POLL_INTERVAL_MS', 200, 1),
        providerTimeoutMs: reader.integer('PROVIDER_TIMEOUT_MS', 30000, 1),
        port: reader.integer('PORT', 3000, 0),
        mnemonic: reader.optional('RELAYER_MNEMONIC')
    };

    if (reader.problems.length > 0) {
        return err({ kind: 'InvalidConfig', problems: reader.problems });
    }
    return ok(config);
}
