import express, { Express, RequestHandler } from 'express';
import { Server } from 'http';
import { Container, ContainerModule, inject, injectable, ServiceIdentifier } from 'inversify';
import { buildProviderModule } from '@inversifyjs/binding-decorators';
import {
    ClassType,
    getRoutes,
    MethodMeta,
    provideSingleton,
    RouteBuilderImpl,
    ServerConfig,
    SERVER_CONFIG_TOKEN,
    WebAppMeta,
} from '@oidc-quickstart/http-routing';
import { RequestContext } from '@oidc-quickstart/core-context';
import { WebServer } from './WebServer';
import { WebMiddleware } from './WebMiddleware';
import { CoreModule } from './modules/CoreModule';
import { SERVER_TYPES } from './extensions/ServerTypes';
import { ExpressMiddlewareExtension } from './extensions/ExpressMiddlewareExtension';
import { ResultWriter } from './extensions/ResultWriter';

/**
 * Server implementation behind the WebServer interface.
 *
 * Two containers:
 * 1. the framework container, holding this class and the route builder
 * 2. the application container, a child of the first, holding CoreModule,
 *    the application's modules and any test overrides
 */
@provideSingleton()
@injectable()
export class WebServerImpl implements WebServer {
    private meta?: WebAppMeta;
    private appContainer?: Container;
    private server?: Server;

    constructor(
        @inject(RouteBuilderImpl) private routeBuilder: RouteBuilderImpl,
        @inject(WebMiddleware) private middleware: WebMiddleware,
        @inject(SERVER_CONFIG_TOKEN) private config: ServerConfig,
    ) {}

    /**
     * Builds the application container and registers routes.
     * Called once by WebServerFactory.create().
     *
     * @param overrides - loaded last, so tests can rebind anything
     */
    async initialize(frameworkContainer: Container, meta: WebAppMeta, overrides?: ContainerModule): Promise<void> {
        if (this.appContainer) {
            return;
        }

        this.meta = meta;
        const appContainer = new Container({ parent: frameworkContainer });
        appContainer.bind<Container>(SERVER_TYPES.AppContainer).toConstantValue(appContainer);
        this.appContainer = appContainer;

        this.routeBuilder.setContainer(appContainer);

        await this.loadDIModules(appContainer, meta, overrides);

        for (const routeConfig of meta.getRoutes()) {
            routeConfig.configure(this.routeBuilder);
        }
    }

    private async loadDIModules(appContainer: Container, meta: WebAppMeta, overrides?: ContainerModule): Promise<void> {
        await appContainer.load(buildProviderModule());
        await appContainer.load(CoreModule);

        for (const module of meta.getDIModules()) {
            await appContainer.load(module);
        }

        if (overrides) {
            await appContainer.load(overrides);
        }
    }

    async start(port: number = this.config.port): Promise<void> {
        const appContainer = this.requireAppContainer();

        const app = express();
        app.disable('x-powered-by');
        app.use(this.middleware.logRequests.bind(this.middleware));

        for (const extension of this.getAll<ExpressMiddlewareExtension>(appContainer, SERVER_TYPES.ExpressMiddlewareExtension)) {
            console.log(`[WebServer] Mounting middleware: ${extension.name}`);
            app.use(extension.createMiddleware());
        }

        const routeCount = this.registerExpressRoutes(app, appContainer);

        // error handlers go last in Express
        app.use(this.middleware.globalErrorHandler.bind(this.middleware));

        await new Promise<void>((resolve, reject) => {
            this.server = app.listen(port, (error?: Error) => {
                if (error) {
                    console.error('[WebServer] Failed to start server:', error);
                    reject(error);
                    return;
                }
                console.log(`[WebServer] Server listening on http://localhost:${port} (public URL ${this.config.baseUrl})`);
                console.log(`[WebServer] Registered ${routeCount} routes`);
                resolve();
            });
        });
    }

    /**
     * One Express handler per route, each with its own filter chain.
     */
    private registerExpressRoutes(app: Express, appContainer: Container): number {
        const resultWriters = this.getAll<ResultWriter>(appContainer, SERVER_TYPES.ResultWriter);
        let count = 0;

        for (const routeWithMeta of this.routeBuilder.getRoutes()) {
            const service = this.routeBuilder.createRouteHandler(routeWithMeta);
            const routeMeta = routeWithMeta.definition.routeMeta;
            const wrapper = this.middleware.createExpressWrapper(service, routeMeta, resultWriters);
            const handler: RequestHandler = (req, res) => wrapper.execute(req, res);

            switch (routeMeta.httpMethod.toUpperCase()) {
                case 'GET':
                    app.get(routeMeta.path, handler);
                    break;
                case 'POST':
                    app.post(routeMeta.path, handler);
                    break;
                case 'PUT':
                    app.put(routeMeta.path, handler);
                    break;
                case 'DELETE':
                    app.delete(routeMeta.path, handler);
                    break;
                default:
                    console.warn(`[WebServer] Unknown HTTP method: ${routeMeta.httpMethod}`);
                    continue;
            }
            count++;
        }

        return count;
    }

    private getAll<T>(container: Container, id: ServiceIdentifier<T>): T[] {
        return container.isBound(id) ? container.getAll<T>(id) : [];
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }

        await new Promise<void>((resolve, reject) => {
            server.close((err?: Error) => {
                if (err) {
                    console.error('[WebServer] Error stopping server:', err);
                    reject(err);
                    return;
                }
                console.log('[WebServer] Server stopped');
                resolve();
            });
        });
        this.server = undefined;
    }

    getContainer(): Container {
        return this.requireAppContainer();
    }

    createApiClient<T>(apiPrototype: ClassType<T>): T {
        this.requireAppContainer();

        const proxy: Record<string, (requestDto: unknown) => Promise<unknown>> = {};

        for (const routeMeta of getRoutes(apiPrototype)) {
            const methodName = routeMeta.methodName;
            // filter chain is built once per method, not per call
            const service = this.routeBuilder.createRouteInvoker(routeMeta.httpMethod, routeMeta.path);

            proxy[methodName] = async (requestDto: unknown): Promise<unknown> => {
                if (!RequestContext.isActive()) {
                    throw new Error(
                        `RequestContext not active for ${routeMeta.controllerClassName}.${methodName}(). ` +
                            `Tests must wrap API calls in RequestContext.run(() => { ... }), ` +
                            `the way ExpressWrapper.execute() does for real requests.`,
                    );
                }

                const meta = new MethodMeta(routeMeta, undefined, requestDto);
                const routeResult = await service.invoke(meta);
                return routeResult.response;
            };
        }

        // the proxy carries exactly the decorated methods of T
        return proxy as T;
    }

    private requireAppContainer(): Container {
        if (!this.appContainer || !this.meta) {
            throw new Error('Server not initialized. Call initialize() first.');
        }
        return this.appContainer;
    }
}
