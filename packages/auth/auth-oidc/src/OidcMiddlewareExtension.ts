import { RequestHandler } from 'express';
import { auth } from 'express-openid-connect';
import { inject, injectable } from 'inversify';
import { ServerConfig, SERVER_CONFIG_TOKEN } from '@oidc-quickstart/http-routing';
import { ExpressMiddlewareExtension } from '@oidc-quickstart/http-server';
import { buildOidcConfig } from './OidcConfig';
import { OidcSettings } from './OidcSettings';
import { OIDC_TYPES } from './OidcTypes';

/**
 * Mounts the SDK middleware. It owns the callback route, the encrypted
 * session cookie and the token exchange, and attaches `req.oidc`/`res.oidc`
 * for everything after it.
 */
@injectable()
export class OidcMiddlewareExtension implements ExpressMiddlewareExtension {
    readonly name = 'express-openid-connect';

    constructor(
        @inject(OIDC_TYPES.OidcSettings) private settings: OidcSettings,
        @inject(OIDC_TYPES.SessionSecret) private sessionSecret: string,
        @inject(SERVER_CONFIG_TOKEN) private serverConfig: ServerConfig,
    ) {}

    createMiddleware(): RequestHandler {
        const config = buildOidcConfig(this.settings, this.serverConfig.baseUrl, this.sessionSecret);
        console.log(
            `[OidcMiddleware] issuer=${config.issuerBaseURL} clientId=${config.clientID} scope="${config.authorizationParams?.scope}" callback=${this.settings.callbackPath}`,
        );
        return auth(config);
    }
}
