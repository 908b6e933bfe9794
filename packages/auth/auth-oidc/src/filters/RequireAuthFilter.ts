import { injectable } from 'inversify';
import {
    AuthContext,
    AuthSchemes,
    ChallengeResult,
    LoginAuthenticationPropertiesBuilder,
} from '@oidc-quickstart/auth-api';
import { RequestContext } from '@oidc-quickstart/core-context';
import { HttpUnauthorizedError, NOT_AUTHENTICATED } from '@oidc-quickstart/http-api';
import { Filter, RouteResult, Service } from '@oidc-quickstart/http-filters';
import { MethodMeta, provideSingleton } from '@oidc-quickstart/http-routing';
import { ServerContextKeys } from '@oidc-quickstart/http-server';

/**
 * Gate for pages that need a signed-in user.
 *
 * Anonymous GETs are answered with a login challenge that returns to the
 * requested URL; anything else gets a 401.
 */
@provideSingleton()
@injectable()
export class RequireAuthFilter extends Filter<MethodMeta, RouteResult<unknown>> {
    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>): Promise<RouteResult<unknown>> {
        if (AuthContext.getPrincipal().isAuthenticated) {
            return await nextFilter.invoke(meta);
        }

        if (meta.httpMethod !== 'GET') {
            throw new HttpUnauthorizedError(`Login required for ${meta.httpMethod} ${meta.path}`, NOT_AUTHENTICATED);
        }

        const returnTo = RequestContext.get(ServerContextKeys.REQUEST_URL) ?? meta.path;
        console.log(`[RequireAuthFilter] Anonymous request for ${returnTo}, challenging`);
        const properties = new LoginAuthenticationPropertiesBuilder().withRedirectUri(returnTo).build();
        return new RouteResult(new ChallengeResult(AuthSchemes.OIDC, properties));
    }
}
