import {
    getRoutes,
    isApiInterface,
    RouteMetadata,
    HeaderMethods,
    LogApiCall,
} from '@oidc-quickstart/http-api';
import { toError } from '@oidc-quickstart/core-util';
import { ClientErrorTranslator } from './ClientErrorTranslator';
import { ContextMgr } from './ContextMgr';

/**
 * Where a client sends its requests and which headers it forwards.
 */
export class ClientConfig {
    /**
     * e.g. 'http://localhost:3000', without a trailing slash
     */
    baseUrl: string;

    /**
     * Headers read through this manager are added to every request.
     */
    contextMgr?: ContextMgr;

    constructor(baseUrl: string, contextMgr?: ContextMgr) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.contextMgr = contextMgr;
    }
}

/**
 * Type-safe HTTP client generated from an API prototype; the client-side
 * counterpart of RESTApiRoutes.
 *
 * ```typescript
 * const config = new ClientConfig('http://localhost:3000', contextMgr);
 * const forecastApi = createClient(ForecastApiPrototype, config);
 * const response = await forecastApi.getForecasts(new ForecastRequest());
 * ```
 *
 * Only @Post() methods are supported: a POST body can grow fields later
 * without changing the route.
 */
export function createClient<T extends object>(apiPrototype: abstract new (...args: never[]) => T, config: ClientConfig): T {
    if (!isApiInterface(apiPrototype)) {
        throw new Error(`Class ${apiPrototype.name || 'Unknown'} must be decorated with @ApiInterface()`);
    }

    const routes = getRoutes(apiPrototype);
    for (const route of routes) {
        if (route.httpMethod !== 'POST') {
            throw new Error(
                `Method '${route.methodName}' uses @${route.httpMethod.charAt(0) + route.httpMethod.slice(1).toLowerCase()}() but clients only support @Post() methods`,
            );
        }
    }

    const proxyClient = new ProxyClient(config, new LogApiCall(), new HeaderMethods(), routes, apiPrototype.name);

    const target: Record<string, (requestDto: unknown) => Promise<unknown>> = {};
    // the proxy answers exactly the decorated methods of T
    return new Proxy(target, {
        get(_target, prop: string | symbol) {
            if (typeof prop !== 'string') {
                throw new Error(`Method names must be strings, not ${typeof prop}`);
            }
            if (!proxyClient.hasRoute(prop)) {
                throw new Error(
                    `No route found for method '${prop}'. Check for typos or ensure the method has @Post() decorator.`,
                );
            }

            const route = proxyClient.getRoute(prop);
            return (requestDto: unknown) => proxyClient.makeRequest(route, requestDto);
        },
    }) as T;
}

/**
 * Sends one HTTP request per API call, with header forwarding, API logging
 * and error translation.
 */
export class ProxyClient {
    private routeMap = new Map<string, RouteMetadata>();

    constructor(
        private config: ClientConfig,
        private logApiCall: LogApiCall,
        private headerMethods: HeaderMethods,
        routes: RouteMetadata[],
        apiName: string,
    ) {
        for (const route of routes) {
            // a copy, so logs name the API without touching the server's metadata
            const logMeta = new RouteMetadata(route.methodName);
            logMeta.httpMethod = route.httpMethod;
            logMeta.path = route.path;
            logMeta.controllerClassName = apiName;
            this.routeMap.set(route.methodName, logMeta);
        }
    }

    hasRoute(methodName: string): boolean {
        return this.routeMap.has(methodName);
    }

    getRoute(methodName: string): RouteMetadata {
        const route = this.routeMap.get(methodName);
        if (!route) {
            throw new Error(`No route found for method ${methodName}`);
        }
        return route;
    }

    /**
     * POSTs the DTO as JSON. Non-2xx answers are parsed as ProtocolError and
     * rethrown as the matching HttpError.
     *
     * Logged as [API-CLIENT-req] / [API-CLIENT-resp-*] with secured headers masked.
     */
    async makeRequest(route: RouteMetadata, requestDto: unknown): Promise<unknown> {
        const url = `${this.config.baseUrl}${route.path}`;
        const contextMgr = this.config.contextMgr;

        const httpHeaders: Record<string, string> = {
            'Content-Type': 'application/json',
        };
        if (contextMgr) {
            for (const [name, value] of contextMgr.readAll()) {
                httpHeaders[name] = value;
            }
        }

        const headersForLogging = contextMgr
            ? this.headerMethods.buildSecureMapForLogs(contextMgr.headerSet, contextMgr.contextReader)
            : new Map<string, string>();

        const options: RequestInit = {
            method: route.httpMethod,
            headers: httpHeaders,
            body: JSON.stringify(requestDto ?? {}),
        };

        return this.logApiCall.execute('CLIENT', route, requestDto, headersForLogging, () =>
            this.executeFetch(url, options),
        );
    }

    private async executeFetch(url: string, options: RequestInit): Promise<unknown> {
        const response = await fetch(url, options);

        if (response.ok && response.status !== 266) {
            const body: unknown = await response.json();
            return body;
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (err: unknown) {
            // not a ProtocolError body, e.g. an HTML page from a proxy
            console.error(`[ProxyClient] Unparseable error body from ${url}:`, toError(err).message);
            body = undefined;
        }

        const protocolError = ClientErrorTranslator.parseProtocolError(body);
        throw ClientErrorTranslator.translateError(response.status, response.statusText, protocolError);
    }
}
