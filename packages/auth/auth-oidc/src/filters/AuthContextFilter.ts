import { inject, injectable } from 'inversify';
import { AuthContext, ClaimsPrincipal } from '@oidc-quickstart/auth-api';
import { Filter, RouteResult, Service } from '@oidc-quickstart/http-filters';
import { MethodMeta, provideSingleton } from '@oidc-quickstart/http-routing';
import { claimsFromUser } from '../claimsFromUser';
import { OidcAccessor } from '../OidcAccessor';
import { OIDC_TYPES } from '../OidcTypes';

/**
 * Copies the SDK session into AuthContext (priority 1900, right after
 * ContextFilter): the principal and the id, access and refresh tokens.
 * Anonymous requests leave AuthContext at its defaults.
 */
@provideSingleton()
@injectable()
export class AuthContextFilter extends Filter<MethodMeta, RouteResult<unknown>> {
    constructor(@inject(OIDC_TYPES.OidcAccessor) private accessor: OidcAccessor) {
        super();
    }

    async filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>): Promise<RouteResult<unknown>> {
        const session = this.accessor.session(meta.routerReqResp);

        if (session?.isAuthenticated()) {
            AuthContext.setPrincipal(new ClaimsPrincipal(claimsFromUser(session.user ?? {}), true));
            AuthContext.setTokens({
                idToken: session.idToken,
                accessToken: session.accessToken?.access_token,
                refreshToken: session.refreshToken,
            });
        }

        return await nextFilter.invoke(meta);
    }
}
