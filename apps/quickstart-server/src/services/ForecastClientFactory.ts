import { ClientConfig, ContextMgr, createClient } from '@oidc-quickstart/http-client';
import { ForecastApi, ForecastApiPrototype } from '../api/ForecastApi';

/**
 * Builds ForecastApi clients that send the headers of the given ContextMgr.
 * Tests rebind APP_TYPES.ForecastClientFactory to a fake.
 */
export interface ForecastClientFactory {
    create(contextMgr: ContextMgr): ForecastApi;
}

export class HttpForecastClientFactory implements ForecastClientFactory {
    constructor(private baseUrl: string) {}

    create(contextMgr: ContextMgr): ForecastApi {
        return createClient(ForecastApiPrototype, new ClientConfig(this.baseUrl, contextMgr));
    }
}
