import { ContainerModule, Newable } from 'inversify';
import { RouteMetadata } from '@oidc-quickstart/http-api';
import { Filter, RouteResult } from '@oidc-quickstart/http-filters';
import { MethodMeta } from './MethodMeta';

/**
 * Filters all work on MethodMeta and RouteResult.
 */
export type HttpFilter = Filter<MethodMeta, RouteResult<unknown>>;

/**
 * A group of routes the application registers.
 */
export interface Routes {
    configure(routeBuilder: RouteBuilder): void;
}

export interface RouteBuilder {
    addRoute(route: RouteDefinition): void;
    addFilter(filter: FilterDefinition): void;
}

export class RouteDefinition {
    constructor(
        public routeMeta: RouteMetadata,
        public controllerClass: Newable<object>,
        public controllerFilepath?: string,
    ) {}
}

/**
 * A filter class with its priority (higher runs first) and the glob of
 * controller source files it applies to:
 *   - '*' every controller
 *   - 'src/controllers/secure/**' + '/*.ts' one directory tree
 *   - '**' + '/LogoutController.ts' one controller
 */
export class FilterDefinition {
    constructor(
        public priority: number,
        public filterClass: Newable<HttpFilter>,
        public filepathPattern: string,
    ) {}
}

/**
 * Entry point the server asks for the application's DI modules and routes.
 */
export interface WebAppMeta {
    getDIModules(): ContainerModule[];
    getRoutes(): Routes[];
}

export const WEBAPP_META_TOKEN = Symbol.for('WebAppMeta');
