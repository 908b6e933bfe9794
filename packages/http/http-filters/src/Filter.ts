/**
 * What a controller handed back, travelling up the filter chain.
 *
 * Either a JSON DTO or an ActionResult (HTML page, redirect, auth challenge).
 */
export class RouteResult<TResult = unknown> {
    constructor(public response?: TResult) {}
}

/**
 * Anything that turns a request into a response: the controller at the end
 * of the chain, or a filter wrapped around what comes after it.
 */
export interface Service<REQ, RESP> {
    invoke(meta: REQ): Promise<RESP>;
}

/**
 * A filter wraps the filters and controller after it.
 *
 * Filters are singletons shared by concurrent requests, so they keep no
 * per-request state on the instance; use RequestContext instead.
 *
 * ```typescript
 * @provideSingleton()
 * @injectable()
 * export class TimingFilter extends Filter<MethodMeta, RouteResult<unknown>> {
 *   async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>) {
 *     const start = Date.now();
 *     const result = await nextFilter.invoke(meta);
 *     console.log(`[TimingFilter] ${meta.path} took ${Date.now() - start}ms`);
 *     return result;
 *   }
 * }
 * ```
 *
 * Order is decided by the priorities in FilterDefinition, not here.
 */
export abstract class Filter<REQ, RESP> {
    abstract filter(meta: REQ, nextFilter: Service<REQ, RESP>): Promise<RESP>;

    /**
     * Compose this filter with the one that runs after it.
     */
    chain(nextFilter: Filter<REQ, RESP>): Filter<REQ, RESP> {
        const outer = this;

        return new (class extends Filter<REQ, RESP> {
            filter(meta: REQ, nextService: Service<REQ, RESP>): Promise<RESP> {
                return outer.filter(meta, {
                    invoke: (m: REQ) => nextFilter.filter(m, nextService),
                });
            }
        })();
    }

    /**
     * Terminate the chain with the final service, normally the controller.
     */
    chainService(svc: Service<REQ, RESP>): Service<REQ, RESP> {
        return {
            invoke: (meta: REQ) => this.filter(meta, svc),
        };
    }
}
