import 'reflect-metadata';

/**
 * Metadata keys for API routing information.
 * Read by both server-side routing and client-side client generation.
 */
export const METADATA_KEYS = {
    API_INTERFACE: 'quickstart:api-interface',
    ROUTES: 'quickstart:routes',
};

/**
 * Route metadata stored on an API prototype, one entry per method.
 */
export class RouteMetadata {
    httpMethod = '';
    path = '';
    methodName: string;
    /**
     * Filled in when a controller is registered against the prototype.
     * Used only for logging.
     */
    controllerClassName?: string;

    constructor(methodName: string) {
        this.methodName = methodName;
    }
}

// Abstract prototypes are decorated, so targets are constructors or prototypes.
type DecoratedTarget = object;

/**
 * Mark an abstract class as an API interface.
 *
 * Usage:
 * ```typescript
 * @ApiInterface()
 * abstract class AccountApiPrototype {
 *   @Get()
 *   @Path('/account/login')
 *   login(request: LoginRequest): Promise<ActionResult> {
 *     throw new Error('Must be implemented');
 *   }
 * }
 * ```
 */
export function ApiInterface(): ClassDecorator {
    return (target: DecoratedTarget) => {
        Reflect.defineMetadata(METADATA_KEYS.API_INTERFACE, true, target);
        if (!Reflect.hasMetadata(METADATA_KEYS.ROUTES, target)) {
            Reflect.defineMetadata(METADATA_KEYS.ROUTES, [], target);
        }
    };
}

function metadataTargetOf(target: DecoratedTarget): object {
    // static methods hand us the constructor, instance methods the prototype
    return typeof target === 'function' ? target : target.constructor;
}

function routeFor(target: DecoratedTarget, propertyKey: string | symbol): RouteMetadata {
    const metadataTarget = metadataTargetOf(target);
    const routes = getRoutes(metadataTarget);
    const methodName = String(propertyKey);

    let route = routes.find((r) => r.methodName === methodName);
    if (!route) {
        route = new RouteMetadata(methodName);
        routes.push(route);
    }
    Reflect.defineMetadata(METADATA_KEYS.ROUTES, routes, metadataTarget);
    return route;
}

function httpMethod(method: string): MethodDecorator {
    return (target: DecoratedTarget, propertyKey: string | symbol) => {
        routeFor(target, propertyKey).httpMethod = method;
    };
}

export function Get(): MethodDecorator {
    return httpMethod('GET');
}

export function Post(): MethodDecorator {
    return httpMethod('POST');
}

export function Put(): MethodDecorator {
    return httpMethod('PUT');
}

export function Delete(): MethodDecorator {
    return httpMethod('DELETE');
}

/**
 * Route path, like JAX-RS @Path.
 */
export function Path(path: string): MethodDecorator {
    return (target: DecoratedTarget, propertyKey: string | symbol) => {
        routeFor(target, propertyKey).path = path;
    };
}

/**
 * All routes declared on an API interface class.
 * The array is a copy; the route objects are shared.
 */
export function getRoutes(apiClass: object): RouteMetadata[] {
    const routes: unknown = Reflect.getMetadata(METADATA_KEYS.ROUTES, apiClass);
    if (!Array.isArray(routes)) {
        return [];
    }
    return routes.filter((r): r is RouteMetadata => r instanceof RouteMetadata);
}

export function isApiInterface(apiClass: object): boolean {
    return Reflect.getMetadata(METADATA_KEYS.API_INTERFACE, apiClass) === true;
}
