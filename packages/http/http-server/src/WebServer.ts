import { Container } from 'inversify';
import { ClassType } from '@oidc-quickstart/http-routing';

/**
 * A configured server, as returned by WebServerFactory.create().
 *
 * ```typescript
 * // Production
 * const server = await WebServerFactory.create(new ProdServerMeta(settings), config);
 * await server.start();
 *
 * // Tests: full filter chain and controllers, no HTTP
 * const server = await WebServerFactory.create(new ProdServerMeta(settings), config, overrides);
 * const profileApi = server.createApiClient(ProfileApiPrototype);
 * await RequestContext.run(() => profileApi.profile({}));
 * ```
 */
export interface WebServer {
    /**
     * Start Express. Resolves once listening.
     *
     * @param port - defaults to ServerConfig.port
     */
    start(port?: number): Promise<void>;

    stop(): Promise<void>;

    /**
     * A client for one API prototype that calls straight into the filter
     * chain. Calls must run inside RequestContext.run(), the way the Express
     * wrapper runs real requests.
     */
    createApiClient<T>(apiPrototype: ClassType<T>): T;

    /**
     * The application container.
     */
    getContainer(): Container;
}
