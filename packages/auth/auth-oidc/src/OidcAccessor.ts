import { injectable } from 'inversify';
import { RequestContext as OidcRequestContext, ResponseContext as OidcResponseContext } from 'express-openid-connect';
import { RouterReqResp } from '@oidc-quickstart/http-routing';
import { ExpressRouterRequest, ExpressRouterResponse } from '@oidc-quickstart/http-server';

/**
 * The parts of the SDK's `req.oidc` the application reads.
 */
export interface OidcSessionView {
    isAuthenticated(): boolean;
    user?: Record<string, unknown>;
    idToken?: string;
    refreshToken?: string;
    accessToken?: { access_token: string };
}

/**
 * The parts of the SDK's `res.oidc` the application calls.
 */
export type OidcResponseView = Pick<OidcResponseContext, 'login' | 'logout'>;

/**
 * Finds the SDK's per-request objects behind an exchange.
 *
 * Tests that drive the filter chain without HTTP rebind this to a fake.
 */
export interface OidcAccessor {
    session(reqResp: RouterReqResp | undefined): OidcSessionView | undefined;
    response(reqResp: RouterReqResp | undefined): OidcResponseView | undefined;
}

/**
 * Reads `req.oidc` and `res.oidc` off the Express objects. Both are absent
 * when the exchange is not an Express one or the middleware is not mounted.
 */
@injectable()
export class ExpressOidcAccessor implements OidcAccessor {
    session(reqResp: RouterReqResp | undefined): OidcSessionView | undefined {
        if (!reqResp || !(reqResp.request instanceof ExpressRouterRequest)) {
            return undefined;
        }
        const oidc: OidcRequestContext | undefined = reqResp.request.getUnderlyingRequest().oidc;
        return oidc;
    }

    response(reqResp: RouterReqResp | undefined): OidcResponseView | undefined {
        if (!reqResp || !(reqResp.response instanceof ExpressRouterResponse)) {
            return undefined;
        }
        const oidc: OidcResponseContext | undefined = reqResp.response.getUnderlyingResponse().oidc;
        return oidc;
    }
}
