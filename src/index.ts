import { Server } from 'http';
import { logger } from './utils/logger';
import { loadRelayerConfig } from './config/relayer-config';
import { createApp } from './api/app';
import { HttpHeaderVerifier } from './clients/HttpHeaderVerifier';
import { RelayerModule } from './services/relayer/RelayerModule';
import type { ChainConfig, RelayerConfig } from './config/relayer-config';
import type { HeaderVerifier } from './services/relayer/light-client/LightClientAdapter';
import type { RelayerModuleOptions } from './services/relayer/RelayerModule';

export { RelayerModule } from './services/relayer/RelayerModule';
export { TransferProtocolHandler } from './services/transfer/TransferProtocolHandler';
export { MemoryHost } from './services/transfer/host/MemoryHost';
export { loadRelayerConfig } from './config/relayer-config';
export type { RelayerConfig } from './config/relayer-config';

export function createRelayer(config: RelayerConfig, options: RelayerModuleOptions): RelayerModule {
    return new RelayerModule(config, options);
}

function daemonHeaderVerifier(providerTimeoutMs: number): (chain: ChainConfig) => HeaderVerifier {
    return chain => {
        if (!chain.lightClientUrl) {
            throw new Error(`No light client configured for ${chain.chainId}`);
        }
        return new HttpHeaderVerifier(chain.chainId, chain.lightClientUrl, providerTimeoutMs);
    };
}

export async function startServer(config: RelayerConfig, options?: RelayerModuleOptions): Promise<{ relayer: RelayerModule; server: Server }> {
    logger.info('Starting relayer...');

    const relayer = createRelayer(config, options ?? { headerVerifierFor: daemonHeaderVerifier(config.providerTimeoutMs) });
    const app = createApp(relayer);

    const server = await new Promise<Server>(resolve => {
        const listening = app.listen(config.port, () => resolve(listening));
    });
    logger.info(`Server running at http://localhost:${config.port}`);

    relayer.start();
    return { relayer, server };
}

async function main(): Promise<void> {
    const config = loadRelayerConfig();
    if (!config.ok) {
        for (const problem of config.error.problems) {
            logger.error(`[Config] ${problem}`);
        }
        process.exit(1);
    }

    const { relayer, server } = await startServer(config.value);

    const shutdown = async (signal: string): Promise<void> => {
        logger.info(`${signal} signal received. Starting graceful shutdown...`);
        relayer.stop();
        await new Promise<void>(resolve => server.close(() => resolve()));

        await new Promise<void>((resolve) => {
            logger.on('finish', resolve);
            logger.end();
        });
        process.exit(0);
    };

    process.on('SIGTERM', () => {
        shutdown('SIGTERM').catch(error => logger.logError(error, 'Shutdown failed'));
    });
    process.on('SIGINT', () => {
        shutdown('SIGINT').catch(error => logger.logError(error, 'Shutdown failed'));
    });
}

if (require.main === module) {
    main().catch(error => {
        logger.logError(error, 'Relayer failed to start');
        process.exit(1);
    });
}
