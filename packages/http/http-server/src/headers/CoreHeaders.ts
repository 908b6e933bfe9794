import { PlatformHeader } from '@oidc-quickstart/http-api';

/**
 * Headers every service transfers and forwards.
 */
export class CoreHeaders {
    static readonly REQUEST_ID = new PlatformHeader('x-request-id', true, false, true);
    static readonly CORRELATION_ID = new PlatformHeader('x-correlation-id', true, false, true);

    static getAllHeaders(): PlatformHeader[] {
        return [CoreHeaders.REQUEST_ID, CoreHeaders.CORRELATION_ID];
    }
}
