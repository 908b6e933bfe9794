import { inject, injectable } from 'inversify';
import { AuthHeaders, BearerTokenContextReader, TokenProvider } from '@oidc-quickstart/auth-api';
import { CompositeContextReader, ContextMgr } from '@oidc-quickstart/http-client';
import { provideSingleton, RequestContextReader } from '@oidc-quickstart/http-routing';
import { CoreHeaders } from '@oidc-quickstart/http-server';
import { WeatherForecast } from '../api/ForecastApi';
import { APP_TYPES } from '../modules/AppTypes';
import { ForecastClientFactory } from './ForecastClientFactory';

/**
 * Calls the forecast API on behalf of the signed-in user.
 *
 * The request id and correlation id of the current request travel along, and
 * the access token from the TokenProvider goes out as the bearer token. An
 * authorization header the browser sent is never forwarded.
 */
@provideSingleton()
@injectable()
export class WeatherForecastService {
    constructor(@inject(APP_TYPES.ForecastClientFactory) private clientFactory: ForecastClientFactory) {}

    async getForecasts(tokenProvider: TokenProvider): Promise<WeatherForecast[]> {
        const coreHeaders = CoreHeaders.getAllHeaders();
        const contextMgr = new ContextMgr(
            new CompositeContextReader([
                new RequestContextReader(coreHeaders),
                new BearerTokenContextReader(tokenProvider),
            ]),
            [...coreHeaders, AuthHeaders.AUTHORIZATION],
        );

        const response = await this.clientFactory.create(contextMgr).getForecasts({});
        return response.forecasts ?? [];
    }
}
