import { inject, injectable, multiInject, optional } from 'inversify';
import { provideSingleton, MethodMeta, RequestContextReader } from '@oidc-quickstart/http-routing';
import { Filter, RouteResult, Service } from '@oidc-quickstart/http-filters';
import {
    HEADER_TYPES,
    HeaderMethods,
    LogApiCall,
    PlatformHeader,
    PlatformHeadersExtension,
} from '@oidc-quickstart/http-api';

/**
 * Structured logging of every API call (priority 1800, right after the
 * context and auth-context filters).
 *
 * Logs [API-SVR-req], then [API-SVR-resp-SUCCESS], [API-SVR-resp-OTHER] for
 * user errors or [API-SVR-resp-FAIL] for server errors. Platform headers are
 * read back from RequestContext, with secured ones masked.
 */
@provideSingleton()
@injectable()
export class LogApiFilter extends Filter<MethodMeta, RouteResult<unknown>> {
    private logApiCall = new LogApiCall();
    private contextReader = new RequestContextReader();
    private allHeaders: PlatformHeader[];

    constructor(
        @multiInject(HEADER_TYPES.PlatformHeadersExtension)
        @optional()
        extensions: PlatformHeadersExtension[] | undefined,
        @inject(HeaderMethods) private headerMethods: HeaderMethods,
    ) {
        super();
        this.allHeaders = (extensions ?? []).flatMap((extension) => extension.getHeaders());
    }

    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>): Promise<RouteResult<unknown>> {
        const headers = this.headerMethods.buildSecureMapForLogs(this.allHeaders, this.contextReader);

        const response = await this.logApiCall.execute('SVR', meta.routeMeta, meta.requestDto, headers, async () => {
            const result = await nextFilter.invoke(meta);
            return result.response;
        });

        return new RouteResult(response);
    }
}
