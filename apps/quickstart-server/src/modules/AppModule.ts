import { ContainerModule } from 'inversify';
import { AppSettings } from '../config/AppSettings';
import { ForecastClientFactory, HttpForecastClientFactory } from '../services/ForecastClientFactory';
import { APP_TYPES, Clock, RandomSource } from './AppTypes';

/**
 * Application bindings that need configuration. Controllers, services and
 * the component renderer carry @provideSingleton() and need no entry here.
 */
export function createAppModule(settings: AppSettings): ContainerModule {
    return new ContainerModule((options) => {
        const { bind } = options;

        bind<AppSettings>(APP_TYPES.AppSettings).toConstantValue(settings);
        bind<ForecastClientFactory>(APP_TYPES.ForecastClientFactory).toConstantValue(
            new HttpForecastClientFactory(settings.forecastApi.baseUrl),
        );
        bind<Clock>(APP_TYPES.Clock).toConstantValue(() => new Date());
        bind<RandomSource>(APP_TYPES.Random).toConstantValue(Math.random);
    });
}
