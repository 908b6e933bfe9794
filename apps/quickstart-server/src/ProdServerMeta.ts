import { ContainerModule } from 'inversify';
import { createOidcModule } from '@oidc-quickstart/auth-oidc';
import { RESTApiRoutes, Routes, WebAppMeta } from '@oidc-quickstart/http-routing';
import { LoginApiPrototype, LogoutApiPrototype } from './api/AccountApi';
import { ForecastApiPrototype } from './api/ForecastApi';
import { FetchDataApiPrototype, HomeApiPrototype, ProfileApiPrototype } from './api/PageApi';
import { AppSettings } from './config/AppSettings';
import { ForecastController } from './controllers/api/ForecastController';
import { HomeController } from './controllers/HomeController';
import { LoginController } from './controllers/LoginController';
import { FetchDataController } from './controllers/secure/FetchDataController';
import { LogoutController } from './controllers/secure/LogoutController';
import { ProfileController } from './controllers/secure/ProfileController';
import { createAppModule } from './modules/AppModule';
import { FilterRoutes } from './routes/FilterRoutes';

/**
 * The application as the server sees it: its DI modules and its routes.
 *
 * ```typescript
 * const server = await WebServerFactory.create(new ProdServerMeta(settings), config);
 * await server.start();
 * ```
 */
export class ProdServerMeta implements WebAppMeta {
    constructor(private settings: AppSettings) {}

    /**
     * Loaded after the framework's CoreModule, in this order.
     */
    getDIModules(): ContainerModule[] {
        return [
            createOidcModule(this.settings.auth, this.settings.server.sessionSecret),
            createAppModule(this.settings),
        ];
    }

    getRoutes(): Routes[] {
        return [
            new FilterRoutes(),
            new RESTApiRoutes(HomeApiPrototype, HomeController),
            new RESTApiRoutes(LoginApiPrototype, LoginController),
            new RESTApiRoutes(LogoutApiPrototype, LogoutController),
            new RESTApiRoutes(ProfileApiPrototype, ProfileController),
            new RESTApiRoutes(FetchDataApiPrototype, FetchDataController),
            new RESTApiRoutes(ForecastApiPrototype, ForecastController),
        ];
    }
}
