import axios, { AxiosInstance } from 'axios';
import { logger } from '../utils/logger';
import { isHeight, isRecord, MalformedResponseError } from './ChainProvider';
import type { HeaderVerifier, LightBlock } from '../services/relayer/light-client/LightClientAdapter';

function isLightBlock(value: unknown): value is LightBlock {
    return isRecord(value)
        && isHeight(value.height)
        && typeof value.timestamp === 'string' && /^\d+$/.test(value.timestamp)
        && typeof value.root === 'string'
        && typeof value.nextValidatorsHash === 'string'
        && typeof value.signedHeader === 'string';
}

/**
 * Reads verified headers from a light client daemon the operator runs and
 * trusts. The daemon performs header verification; this class only fetches and
 * shape-checks its output.
 */
export class HttpHeaderVerifier implements HeaderVerifier {
    private client: AxiosInstance;

    constructor(private readonly chainId: string, private readonly endpoint: string, timeoutMs: number = 30000) {
        this.client = axios.create({
            baseURL: endpoint,
            timeout: timeoutMs,
            headers: {
                'Content-Type': 'application/json',
            },
        });
    }

    public async verifiedHeader(revisionHeight: number): Promise<LightBlock> {
        const response = await this.client.get(`/light_block/${revisionHeight}`);
        const block: unknown = response.data;
        if (!isLightBlock(block)) {
            throw new MalformedResponseError(this.endpoint, 'light block');
        }
        logger.debug(`[HttpHeaderVerifier] Verified header for ${this.chainId} at ${revisionHeight}`);
        return block;
    }
}
