import { ConfigParams } from 'express-openid-connect';
import { OidcSettings } from './OidcSettings';

/**
 * Authorization request parameters as the SDK types them. The SDK takes the
 * type from openid-client without re-exporting it.
 */
export type AuthorizationParameters = NonNullable<ConfigParams['authorizationParams']>;

const OFFLINE_ACCESS = 'offline_access';

/**
 * `https://<domain>` unless the domain already names a scheme.
 */
export function toIssuerBaseUrl(domain: string): string {
    const issuer = /^https?:\/\//i.test(domain) ? domain : `https://${domain}`;
    return issuer.replace(/\/+$/, '');
}

export function buildScope(settings: OidcSettings): string {
    const scopes = settings.scope.split(/\s+/).filter((scope) => scope.length > 0);
    if (settings.useRefreshTokens && !scopes.includes(OFFLINE_ACCESS)) {
        scopes.push(OFFLINE_ACCESS);
    }
    return scopes.join(' ');
}

/**
 * SDK configuration for the OIDC middleware.
 *
 * The SDK's own /login and /logout routes are switched off: login and logout
 * go through LoginController and LogoutController, which hand a
 * ChallengeResult or SignOutResult to OidcResultWriter. The callback route
 * stays with the SDK.
 */
export function buildOidcConfig(settings: OidcSettings, baseUrl: string, sessionSecret: string): ConfigParams {
    const authorizationParams: AuthorizationParameters = {
        response_type: settings.clientSecret ? 'code' : 'id_token',
        scope: buildScope(settings),
    };
    if (settings.audience) {
        authorizationParams.audience = settings.audience;
    }

    const config: ConfigParams = {
        issuerBaseURL: toIssuerBaseUrl(settings.domain),
        baseURL: baseUrl,
        clientID: settings.clientId,
        secret: sessionSecret,
        authRequired: false,
        idpLogout: true,
        routes: {
            login: false,
            logout: false,
            callback: settings.callbackPath,
        },
        authorizationParams,
    };
    if (settings.clientSecret) {
        config.clientSecret = settings.clientSecret;
    }
    return config;
}
