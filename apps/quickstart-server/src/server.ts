import 'reflect-metadata';
import { toError } from '@oidc-quickstart/core-util';
import { ServerConfig } from '@oidc-quickstart/http-routing';
import { WebServerFactory } from '@oidc-quickstart/http-server';
import { loadAppSettings } from './config/AppSettings';
import { ProdServerMeta } from './ProdServerMeta';

async function main(): Promise<void> {
    console.log('[Server] Starting OIDC quickstart server...');

    const settings = loadAppSettings();
    const config = new ServerConfig(settings.server.port, settings.server.baseUrl);
    const server = await WebServerFactory.create(new ProdServerMeta(settings), config);
    await server.start();

    await new Promise<void>((resolve) => {
        process.once('SIGTERM', () => {
            console.log('[Server] Received SIGTERM signal, shutting down...');
            resolve();
        });
        process.once('SIGINT', () => {
            console.log('[Server] Received SIGINT signal, shutting down...');
            resolve();
        });
    });

    await server.stop();
}

if (require.main === module) {
    main().catch((err: unknown) => {
        console.error('[Server] Error during startup:', toError(err));
        process.exit(1);
    });
}

export { main };
