import { ContainerModule } from 'inversify';
import { AuthHeaders } from '@oidc-quickstart/auth-api';
import { HEADER_TYPES, PlatformHeadersExtension } from '@oidc-quickstart/http-api';
import { ExpressMiddlewareExtension, ResultWriter, SERVER_TYPES } from '@oidc-quickstart/http-server';
import { ExpressOidcAccessor, OidcAccessor } from './OidcAccessor';
import { OidcMiddlewareExtension } from './OidcMiddlewareExtension';
import { OidcResultWriter } from './OidcResultWriter';
import { OidcSettings } from './OidcSettings';
import { OIDC_TYPES } from './OidcTypes';

/**
 * Registers the OIDC scheme:
 * - the SDK middleware, mounted ahead of every route
 * - the writer for ChallengeResult and SignOutResult
 * - the authorization header as a platform header
 */
export function createOidcModule(settings: OidcSettings, sessionSecret: string): ContainerModule {
    return new ContainerModule((options) => {
        const { bind } = options;

        bind<OidcSettings>(OIDC_TYPES.OidcSettings).toConstantValue(settings);
        bind<string>(OIDC_TYPES.SessionSecret).toConstantValue(sessionSecret);
        bind<OidcAccessor>(OIDC_TYPES.OidcAccessor).to(ExpressOidcAccessor).inSingletonScope();

        bind<PlatformHeadersExtension>(HEADER_TYPES.PlatformHeadersExtension).toConstantValue(
            new PlatformHeadersExtension(AuthHeaders.getAllHeaders()),
        );
        bind<ExpressMiddlewareExtension>(SERVER_TYPES.ExpressMiddlewareExtension)
            .to(OidcMiddlewareExtension)
            .inSingletonScope();
        bind<ResultWriter>(SERVER_TYPES.ResultWriter).to(OidcResultWriter).inSingletonScope();

        console.log(`[OidcModule] Registered OIDC scheme for ${settings.domain}`);
    });
}
