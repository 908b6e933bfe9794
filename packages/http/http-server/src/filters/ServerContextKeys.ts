import { ContextKey } from '@oidc-quickstart/core-context';
import { MethodMeta } from '@oidc-quickstart/http-routing';

/**
 * Request metadata ContextFilter puts in RequestContext.
 */
export const ServerContextKeys = {
    METHOD_META: new ContextKey<MethodMeta>('METHOD_META'),
    /**
     * Path and query string of the incoming request, or the route path when a
     * test drives the chain without HTTP.
     */
    REQUEST_URL: new ContextKey<string>('REQUEST_URL'),
    HTTP_METHOD: new ContextKey<string>('HTTP_METHOD'),
};
