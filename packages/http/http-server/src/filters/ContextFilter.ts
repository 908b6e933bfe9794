import { inject, injectable, multiInject, optional } from 'inversify';
import { provideSingleton, MethodMeta } from '@oidc-quickstart/http-routing';
import { RequestContext } from '@oidc-quickstart/core-context';
import { Filter, RouteResult, Service } from '@oidc-quickstart/http-filters';
import { PlatformHeader, PlatformHeadersExtension, HeaderMethods, HEADER_TYPES } from '@oidc-quickstart/http-api';
import { CoreHeaders } from '../headers/CoreHeaders';
import { ServerContextKeys } from './ServerContextKeys';

/**
 * First filter of every chain (priority 2000).
 *
 * 1. copies the transferable platform headers from MethodMeta.requestHeaders
 *    into RequestContext, then clears requestHeaders
 * 2. generates x-request-id when the caller sent none
 * 3. stores the method meta, request URL and HTTP method
 *
 * RequestContext itself is opened by the Express wrapper, or by the test.
 */
@provideSingleton()
@injectable()
export class ContextFilter extends Filter<MethodMeta, RouteResult<unknown>> {
    private transferHeaders: PlatformHeader[];

    constructor(
        @multiInject(HEADER_TYPES.PlatformHeadersExtension)
        @optional()
        extensions: PlatformHeadersExtension[] | undefined,
        @inject(HeaderMethods) headerMethods: HeaderMethods,
    ) {
        super();

        const allHeaders: PlatformHeader[] = [];
        for (const extension of extensions ?? []) {
            allHeaders.push(...extension.getHeaders());
        }
        this.transferHeaders = headerMethods.findTransferHeaders(allHeaders);

        console.log(
            `[ContextFilter] Collected ${allHeaders.length} platform headers from ${extensions?.length ?? 0} extensions`,
        );
    }

    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>): Promise<RouteResult<unknown>> {
        this.transferHeadersToContext(meta);

        RequestContext.put(ServerContextKeys.METHOD_META, meta);
        RequestContext.put(ServerContextKeys.REQUEST_URL, meta.routerReqResp?.request.getOriginalUrl() ?? meta.path);
        RequestContext.put(ServerContextKeys.HTTP_METHOD, meta.httpMethod);

        return await nextFilter.invoke(meta);
    }

    private transferHeadersToContext(meta: MethodMeta): void {
        const requestHeaders = meta.requestHeaders;
        if (requestHeaders) {
            for (const header of this.transferHeaders) {
                const values = requestHeaders.get(header.headerName);
                if (values && values.length > 0) {
                    RequestContext.putHeader(header, values[0]);
                }
            }
            // everything downstream reads headers from RequestContext
            meta.requestHeaders = undefined;
        }

        if (!RequestContext.hasHeader(CoreHeaders.REQUEST_ID)) {
            RequestContext.putHeader(CoreHeaders.REQUEST_ID, this.generateRequestId());
        }
    }

    private generateRequestId(): string {
        return `svrGenReqId-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
    }
}
