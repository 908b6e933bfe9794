import { AuthContext, AuthHeaders, ChallengeResult } from '@oidc-quickstart/auth-api';
import { RequestContext } from '@oidc-quickstart/core-context';
import { HttpUnauthorizedError, MISSING_BEARER_TOKEN, NOT_AUTHENTICATED, RouteMetadata } from '@oidc-quickstart/http-api';
import { RouteResult, Service } from '@oidc-quickstart/http-filters';
import { MethodMeta } from '@oidc-quickstart/http-routing';
import { ServerContextKeys } from '@oidc-quickstart/http-server';
import { AuthContextFilter } from '../filters/AuthContextFilter';
import { BearerTokenFilter, BEARER_TOKEN } from '../filters/BearerTokenFilter';
import { RequireAuthFilter } from '../filters/RequireAuthFilter';
import { OidcAccessor, OidcResponseView, OidcSessionView } from '../OidcAccessor';

class FixedSessionAccessor implements OidcAccessor {
    constructor(private oidcSession?: OidcSessionView) {}

    session(): OidcSessionView | undefined {
        return this.oidcSession;
    }

    response(): OidcResponseView | undefined {
        return undefined;
    }
}

function methodMeta(httpMethod: string, path: string): MethodMeta {
    const routeMeta = new RouteMetadata('handle');
    routeMeta.httpMethod = httpMethod;
    routeMeta.path = path;
    return new MethodMeta(routeMeta);
}

const reachedController: Service<MethodMeta, RouteResult<unknown>> = {
    invoke: async () => new RouteResult('controller'),
};

describe('AuthContextFilter', () => {
    it('should copy the principal and tokens of a signed-in user', async () => {
        const filter = new AuthContextFilter(
            new FixedSessionAccessor({
                isAuthenticated: () => true,
                user: { sub: 'idp|42', name: 'Jane Doe', email: 'jane@example.test' },
                idToken: 'test-id-token',
                refreshToken: 'test-refresh-token',
                accessToken: { access_token: 'test-access-token' },
            }),
        );

        await RequestContext.run(async () => {
            await filter.filter(methodMeta('GET', '/profile'), reachedController);

            const principal = AuthContext.getPrincipal();
            expect(principal.isAuthenticated).toBe(true);
            expect(principal.name).toBe('Jane Doe');
            expect(principal.findFirstValue('email')).toBe('jane@example.test');
            expect(AuthContext.getTokens()).toEqual({
                idToken: 'test-id-token',
                accessToken: 'test-access-token',
                refreshToken: 'test-refresh-token',
            });
        });
    });

    it('should leave anonymous sessions anonymous', async () => {
        const filter = new AuthContextFilter(new FixedSessionAccessor({ isAuthenticated: () => false }));

        await RequestContext.run(async () => {
            const result = await filter.filter(methodMeta('GET', '/'), reachedController);

            expect(result.response).toBe('controller');
            expect(AuthContext.getPrincipal().isAuthenticated).toBe(false);
            expect(AuthContext.getTokens()).toEqual({});
        });
    });

    it('should treat a missing session as anonymous', async () => {
        const filter = new AuthContextFilter(new FixedSessionAccessor(undefined));

        await RequestContext.run(async () => {
            await filter.filter(methodMeta('GET', '/'), reachedController);

            expect(AuthContext.getPrincipal().isAuthenticated).toBe(false);
        });
    });
});

describe('RequireAuthFilter', () => {
    const filter = new RequireAuthFilter();

    it('should let signed-in users through', async () => {
        const signedIn = new AuthContextFilter(
            new FixedSessionAccessor({ isAuthenticated: () => true, user: { sub: 'idp|42' } }),
        );

        const result = await RequestContext.run(() =>
            signedIn.filter(methodMeta('GET', '/profile'), filter.chainService(reachedController)),
        );

        expect(result.response).toBe('controller');
    });

    it('should challenge anonymous GETs back to the requested url', async () => {
        const result = await RequestContext.run(() => {
            RequestContext.put(ServerContextKeys.REQUEST_URL, '/fetchdata?page=2');
            return filter.filter(methodMeta('GET', '/fetchdata'), reachedController);
        });

        const challenge = result.response;
        expect(challenge).toBeInstanceOf(ChallengeResult);
        expect(challenge).toMatchObject({ scheme: 'oidc', properties: { redirectUri: '/fetchdata?page=2' } });
    });

    it('should fall back to the route path without a request url', async () => {
        const result = await RequestContext.run(() => filter.filter(methodMeta('GET', '/profile'), reachedController));

        expect(result.response).toMatchObject({ properties: { redirectUri: '/profile' } });
    });

    it('should answer anonymous POSTs with 401', async () => {
        const call = RequestContext.run(() => filter.filter(methodMeta('POST', '/profile'), reachedController));

        await expect(call).rejects.toBeInstanceOf(HttpUnauthorizedError);
        await expect(call).rejects.toMatchObject({ subType: NOT_AUTHENTICATED });
    });
});

describe('BearerTokenFilter', () => {
    const filter = new BearerTokenFilter();

    it('should accept a bearer token and keep it in context', async () => {
        const token = await RequestContext.run(async () => {
            RequestContext.putHeader(AuthHeaders.AUTHORIZATION, 'Bearer test-access-token');
            await filter.filter(methodMeta('POST', '/api/forecasts'), reachedController);
            return RequestContext.get(BEARER_TOKEN);
        });

        expect(token).toBe('test-access-token');
    });

    it('should reject requests without a token', async () => {
        const call = RequestContext.run(() => filter.filter(methodMeta('POST', '/api/forecasts'), reachedController));

        await expect(call).rejects.toMatchObject({ code: 401, subType: MISSING_BEARER_TOKEN });
    });

    it('should reject other authorization schemes', async () => {
        const call = RequestContext.run(() => {
            RequestContext.putHeader(AuthHeaders.AUTHORIZATION, 'Basic dGVzdDp0ZXN0');
            return filter.filter(methodMeta('POST', '/api/forecasts'), reachedController);
        });

        await expect(call).rejects.toThrow('Bearer token required for /api/forecasts');
    });
});
