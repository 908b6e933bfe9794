import { injectable } from 'inversify';
import { AuthHeaders } from '@oidc-quickstart/auth-api';
import { ContextKey, RequestContext } from '@oidc-quickstart/core-context';
import { HttpUnauthorizedError, MISSING_BEARER_TOKEN } from '@oidc-quickstart/http-api';
import { Filter, RouteResult, Service } from '@oidc-quickstart/http-filters';
import { MethodMeta, provideSingleton } from '@oidc-quickstart/http-routing';

export const BEARER_TOKEN = new ContextKey<string>('BEARER_TOKEN');

/**
 * Gate for APIs called with an access token. Requires
 * `Authorization: Bearer <token>` and stores the token under BEARER_TOKEN.
 *
 * Signature and audience checks belong to a real resource server and are not
 * done here.
 */
@provideSingleton()
@injectable()
export class BearerTokenFilter extends Filter<MethodMeta, RouteResult<unknown>> {
    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>): Promise<RouteResult<unknown>> {
        const authorization = RequestContext.getHeader(AuthHeaders.AUTHORIZATION);
        const match = authorization ? /^Bearer\s+(\S+)$/i.exec(authorization) : null;
        if (!match) {
            throw new HttpUnauthorizedError(`Bearer token required for ${meta.path}`, MISSING_BEARER_TOKEN);
        }

        RequestContext.put(BEARER_TOKEN, match[1]);
        return await nextFilter.invoke(meta);
    }
}
