import { Container, ContainerModule } from 'inversify';
import { buildProviderModule } from '@inversifyjs/binding-decorators';
import { WebAppMeta, WEBAPP_META_TOKEN, ServerConfig, SERVER_CONFIG_TOKEN } from '@oidc-quickstart/http-routing';
import { WebServer } from './WebServer';
import { WebServerImpl } from './WebServerImpl';

/**
 * Creates and initializes servers, so no caller can skip or repeat
 * initialization.
 *
 * ```typescript
 * const overrides = new ContainerModule(async (options) => {
 *     (await options.rebind(APP_TYPES.ForecastClientFactory)).toConstantValue(fakeFactory);
 * });
 * const server = await WebServerFactory.create(new ProdServerMeta(settings), config, overrides);
 * ```
 */
export class WebServerFactory {
    /**
     * @param appOverrides - loaded after the application modules, may rebind
     */
    static async create(meta: WebAppMeta, config: ServerConfig, appOverrides?: ContainerModule): Promise<WebServer> {
        const frameworkContainer = new Container();

        frameworkContainer.bind<WebAppMeta>(WEBAPP_META_TOKEN).toConstantValue(meta);
        frameworkContainer.bind<ServerConfig>(SERVER_CONFIG_TOKEN).toConstantValue(config);

        await frameworkContainer.load(buildProviderModule());

        const serverImpl = frameworkContainer.get(WebServerImpl);
        await serverImpl.initialize(frameworkContainer, meta, appOverrides);

        return serverImpl;
    }
}
