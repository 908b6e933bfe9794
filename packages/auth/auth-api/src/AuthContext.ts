import { ContextKey, RequestContext } from '@oidc-quickstart/core-context';
import { ClaimsPrincipal } from './claims';
import { InitialApplicationState } from './TokenProvider';

export const AuthContextKeys = {
    PRINCIPAL: new ContextKey<ClaimsPrincipal>('PRINCIPAL'),
    TOKENS: new ContextKey<InitialApplicationState>('TOKENS'),
};

/**
 * The authenticated user and their tokens for the current request.
 *
 * Filled by AuthContextFilter; everything after it reads from here rather
 * than from the SDK's request object.
 */
export class AuthContext {
    static setPrincipal(principal: ClaimsPrincipal): void {
        RequestContext.put(AuthContextKeys.PRINCIPAL, principal);
    }

    /**
     * The anonymous principal when nobody is signed in or outside a request.
     */
    static getPrincipal(): ClaimsPrincipal {
        return RequestContext.get(AuthContextKeys.PRINCIPAL) ?? ClaimsPrincipal.anonymous();
    }

    static setTokens(tokens: InitialApplicationState): void {
        RequestContext.put(AuthContextKeys.TOKENS, { ...tokens });
    }

    static getTokens(): InitialApplicationState {
        const tokens = RequestContext.get(AuthContextKeys.TOKENS);
        return tokens ? { ...tokens } : {};
    }
}
