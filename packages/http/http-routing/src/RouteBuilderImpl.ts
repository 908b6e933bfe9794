import { Container, injectable } from 'inversify';
import { RouteResult, Service } from '@oidc-quickstart/http-filters';
import { RouteBuilder, RouteDefinition, FilterDefinition } from './WebAppMeta';
import { provideSingleton } from './decorators';
import { RouteHandler } from './RouteHandler';
import { MethodMeta } from './MethodMeta';
import { FilterMatcher, FilterWithMeta } from './FilterMatcher';

/**
 * Calls one method on a controller resolved once at registration.
 */
export class RouteHandlerImpl extends RouteHandler<unknown> {
    constructor(
        private controllerName: string,
        private invokeMethod: (requestDto: unknown) => Promise<unknown>,
    ) {
        super();
    }

    execute(meta: MethodMeta): Promise<unknown> {
        return this.invokeMethod(meta.requestDto);
    }

    toString(): string {
        return `RouteHandlerImpl(${this.controllerName})`;
    }
}

/**
 * A route handler paired with the definition it was built from.
 */
export class RouteHandlerWithMeta {
    constructor(
        public invokeControllerHandler: RouteHandler<unknown>,
        public definition: RouteDefinition,
    ) {}
}

/**
 * Collects routes and filters and builds the filter chain for each route.
 *
 * Lives in the framework container but resolves controllers and filters from
 * the application container, handed over through setContainer() once that
 * container exists.
 */
@provideSingleton()
@injectable()
export class RouteBuilderImpl implements RouteBuilder {
    private routes: RouteHandlerWithMeta[] = [];
    private filterRegistry: FilterWithMeta[] = [];
    private container?: Container;

    /**
     * "METHOD:path" to route, for createRouteInvoker().
     */
    private routeMap: Map<string, RouteHandlerWithMeta> = new Map();

    private createRouteKey(method: string, path: string): string {
        return `${method.toUpperCase()}:${path}`;
    }

    setContainer(container: Container): void {
        this.container = container;
    }

    addRoute(route: RouteDefinition): void {
        const key = this.createRouteKey(route.routeMeta.httpMethod, route.routeMeta.path);
        if (this.routeMap.has(key)) {
            throw new Error(`Route registered twice: ${route.routeMeta.httpMethod} ${route.routeMeta.path}`);
        }

        const routeWithMeta = this.createRouteHandlerWithMeta(route);
        this.routes.push(routeWithMeta);
        this.routeMap.set(key, routeWithMeta);
    }

    /**
     * Resolves the controller once, not per request.
     */
    private createRouteHandlerWithMeta(route: RouteDefinition): RouteHandlerWithMeta {
        const container = this.requireContainer();
        const routeMeta = route.routeMeta;

        const controller = container.get(route.controllerClass);
        const method: unknown = Reflect.get(controller, routeMeta.methodName);
        if (typeof method !== 'function') {
            throw new Error(
                `Method ${routeMeta.methodName} not found on controller ${route.controllerClass.name || 'Unknown'}`,
            );
        }

        const invoke = async (requestDto: unknown): Promise<unknown> => method.call(controller, requestDto);
        return new RouteHandlerWithMeta(new RouteHandlerImpl(route.controllerClass.name, invoke), route);
    }

    addFilter(filterDef: FilterDefinition): void {
        const filter = this.requireContainer().get(filterDef.filterClass);
        this.filterRegistry.push(new FilterWithMeta(filter, filterDef));
    }

    getRoutes(): RouteHandlerWithMeta[] {
        return this.routes;
    }

    /**
     * Builds the service for one route: matching filters chained in priority
     * order around the controller.
     */
    public createRouteHandler(routeWithMeta: RouteHandlerWithMeta): Service<MethodMeta, RouteResult<unknown>> {
        const route = routeWithMeta.definition;
        const routeMeta = route.routeMeta;

        console.log(`[RouteBuilder] Setting up route: ${routeMeta.httpMethod} ${routeMeta.path}`);

        const matchingFilters = FilterMatcher.findMatchingFilters(route.controllerFilepath, this.filterRegistry);
        if (matchingFilters.length === 0) {
            throw new Error(
                'No filters found for route. Check filter definitions as you must have at least ContextFilter',
            );
        }

        const controllerService: Service<MethodMeta, RouteResult<unknown>> = {
            invoke: async (meta: MethodMeta): Promise<RouteResult<unknown>> => {
                const result = await routeWithMeta.invokeControllerHandler.execute(meta);
                return new RouteResult(result);
            },
        };

        let filterChain = matchingFilters[0];
        for (let i = 1; i < matchingFilters.length; i++) {
            filterChain = filterChain.chain(matchingFilters[i]);
        }

        return filterChain.chainService(controllerService);
    }

    /**
     * Service for one route, looked up by method and path. Used by
     * WebServer.createApiClient() to drive routes without HTTP.
     */
    createRouteInvoker(method: string, path: string): Service<MethodMeta, RouteResult<unknown>> {
        const routeWithMeta = this.routeMap.get(this.createRouteKey(method, path));
        if (!routeWithMeta) {
            throw new Error(`Route not found: ${method} ${path}`);
        }
        return this.createRouteHandler(routeWithMeta);
    }

    private requireContainer(): Container {
        if (!this.container) {
            throw new Error('Container not set. Call setContainer() before registering routes and filters.');
        }
        return this.container;
    }
}
