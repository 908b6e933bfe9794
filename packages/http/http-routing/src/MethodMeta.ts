import { RouteMetadata } from '@oidc-quickstart/http-api';
import { RouterReqResp } from './RouterReqResp';

/**
 * Per-request data handed down the filter chain.
 *
 * Holds DTOs only; the HTTP exchange is reachable through routerReqResp,
 * which is absent when a test drives the chain without Express.
 */
export class MethodMeta {
    routeMeta: RouteMetadata;

    /**
     * Incoming headers, lowercase name to values.
     *
     * Set by the Express wrapper and cleared by ContextFilter once the platform
     * headers are in RequestContext. Filters after ContextFilter must read
     * RequestContext.getHeader() instead.
     */
    public requestHeaders?: Map<string, string[]>;

    /**
     * Parsed JSON body, or the query string for GET routes.
     */
    requestDto?: unknown;

    routerReqResp?: RouterReqResp;

    /**
     * Scratch space for filters to pass data along.
     */
    metadata: Map<string, unknown>;

    constructor(
        routeMeta: RouteMetadata,
        requestHeaders?: Map<string, string[]>,
        requestDto?: unknown,
        routerReqResp?: RouterReqResp,
    ) {
        this.routeMeta = routeMeta;
        this.requestHeaders = requestHeaders;
        this.requestDto = requestDto;
        this.routerReqResp = routerReqResp;
        this.metadata = new Map();
    }

    get httpMethod(): string {
        return this.routeMeta.httpMethod;
    }

    get path(): string {
        return this.routeMeta.path;
    }

    get methodName(): string {
        return this.routeMeta.methodName;
    }
}
