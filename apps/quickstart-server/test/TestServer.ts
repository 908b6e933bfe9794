import { ContainerModule } from 'inversify';
import { OidcAccessor, OidcResponseView, OidcSessionView, OIDC_TYPES } from '@oidc-quickstart/auth-oidc';
import { ContextMgr } from '@oidc-quickstart/http-client';
import { ServerConfig } from '@oidc-quickstart/http-routing';
import { WebServer, WebServerFactory } from '@oidc-quickstart/http-server';
import { ForecastApi, WeatherForecast } from '../src/api/ForecastApi';
import { parseAppSettings } from '../src/config/AppSettings';
import { APP_TYPES } from '../src/modules/AppTypes';
import { ProdServerMeta } from '../src/ProdServerMeta';
import { ForecastClientFactory } from '../src/services/ForecastClientFactory';

export const TEST_SETTINGS = {
    auth: {
        domain: 'tenant.idp.test',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        scope: 'openid profile email',
        useRefreshTokens: true,
    },
    server: {
        port: 3000,
        sessionSecret: 'test-session-secret',
    },
};

/**
 * Stands in for the SDK: whatever user is set here is "signed in" for every
 * request driven through the test server.
 */
export class FakeOidcAccessor implements OidcAccessor {
    private current?: OidcSessionView;

    signIn(user: Record<string, unknown>, accessToken: string = 'test-access-token'): void {
        this.current = {
            isAuthenticated: () => true,
            user,
            idToken: 'test-id-token',
            refreshToken: 'test-refresh-token',
            accessToken: { access_token: accessToken },
        };
    }

    /**
     * A session from the id_token flow: identity only, no access token.
     */
    signInWithoutAccessToken(user: Record<string, unknown>): void {
        this.current = {
            isAuthenticated: () => true,
            user,
            idToken: 'test-id-token',
        };
    }

    signOut(): void {
        this.current = undefined;
    }

    session(): OidcSessionView | undefined {
        return this.current;
    }

    response(): OidcResponseView | undefined {
        return undefined;
    }
}

/**
 * Returns canned forecasts, or throws failWith, and records the headers each
 * call would send.
 */
export class RecordingForecastClientFactory implements ForecastClientFactory {
    sentHeaders: Map<string, string>[] = [];
    failWith?: Error;

    constructor(private forecasts: WeatherForecast[] = []) {}

    create(contextMgr: ContextMgr): ForecastApi {
        return {
            getForecasts: async () => {
                this.sentHeaders.push(contextMgr.readAll());
                if (this.failWith) {
                    throw this.failWith;
                }
                return { forecasts: this.forecasts };
            },
        };
    }
}

export const FIXED_NOW = new Date('2026-03-10T15:00:00.000Z');

export interface TestServerParts {
    server: WebServer;
    oidc: FakeOidcAccessor;
    forecastClients: RecordingForecastClientFactory;
}

/**
 * ProdServerMeta with the SDK, the forecast client, the clock and the random
 * source replaced.
 */
export async function createTestServer(forecasts: WeatherForecast[] = []): Promise<TestServerParts> {
    const oidc = new FakeOidcAccessor();
    const forecastClients = new RecordingForecastClientFactory(forecasts);

    const overrides = new ContainerModule(async (options) => {
        (await options.rebind(OIDC_TYPES.OidcAccessor)).toConstantValue(oidc);
        (await options.rebind(APP_TYPES.ForecastClientFactory)).toConstantValue(forecastClients);
        (await options.rebind(APP_TYPES.Clock)).toConstantValue(() => FIXED_NOW);
        (await options.rebind(APP_TYPES.Random)).toConstantValue(() => 0.5);
    });

    const settings = parseAppSettings(TEST_SETTINGS, {});
    const config = new ServerConfig(settings.server.port, settings.server.baseUrl);
    const server = await WebServerFactory.create(new ProdServerMeta(settings), config, overrides);

    return { server, oidc, forecastClients };
}
