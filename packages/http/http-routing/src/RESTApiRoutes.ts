import { Newable } from 'inversify';
import { getRoutes, isApiInterface, RouteMetadata } from '@oidc-quickstart/http-api';
import { Routes, RouteBuilder, RouteDefinition } from './WebAppMeta';
import { getSourceFile } from './decorators';

/**
 * Any class, abstract or not. API prototypes are abstract.
 */
export type ClassType<T = object> = abstract new (...args: never[]) => T;

/**
 * Wires an API prototype to the controller implementing it.
 *
 * ```typescript
 * getRoutes(): Routes[] {
 *   return [
 *     new FilterRoutes(),
 *     new RESTApiRoutes(ProfileApiPrototype, ProfileController),
 *   ];
 * }
 * ```
 *
 * The prototype carries @ApiInterface() and per-method @Get()/@Post() plus
 * @Path(); the controller carries @Controller() and implements every method.
 */
export class RESTApiRoutes<TApi extends object, TController extends TApi> implements Routes {
    constructor(
        private apiMetaClass: ClassType<TApi>,
        private controllerClass: Newable<TController>,
    ) {
        if (!isApiInterface(apiMetaClass)) {
            throw new Error(`Class ${apiMetaClass.name || 'Unknown'} must be decorated with @ApiInterface()`);
        }

        this.validateControllerImplementsApi();
    }

    private validateControllerImplementsApi(): void {
        for (const route of getRoutes(this.apiMetaClass)) {
            const candidate: unknown = Reflect.get(this.controllerClass.prototype, route.methodName);
            if (typeof candidate !== 'function') {
                throw new Error(
                    `Controller ${this.controllerClass.name || 'Unknown'} must implement method ${route.methodName} from API ${this.apiMetaClass.name || 'Unknown'}`,
                );
            }
        }
    }

    configure(routeBuilder: RouteBuilder): void {
        for (const route of getRoutes(this.apiMetaClass)) {
            this.registerRoute(routeBuilder, route);
        }
    }

    private registerRoute(routeBuilder: RouteBuilder, route: RouteMetadata): void {
        if (!route.httpMethod || !route.path) {
            throw new Error(
                `Method ${route.methodName} in ${this.apiMetaClass.name || 'Unknown'} must have both @HttpMethod and @Path decorators`,
            );
        }

        route.controllerClassName = this.controllerClass.name;
        routeBuilder.addRoute(new RouteDefinition(route, this.controllerClass, this.getControllerFilepath()));
    }

    /**
     * Path from @SourceFile, else a guess built from the class name.
     */
    private getControllerFilepath(): string | undefined {
        const filepath = getSourceFile(this.controllerClass);
        if (filepath) {
            return filepath;
        }
        const className = this.controllerClass.name;
        return className ? `**/${className}.ts` : undefined;
    }

    getApiClass(): ClassType<TApi> {
        return this.apiMetaClass;
    }

    getControllerClass(): Newable<TController> {
        return this.controllerClass;
    }
}
