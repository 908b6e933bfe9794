import { PlatformHeader } from '@oidc-quickstart/http-api';

export class AuthHeaders {
    /**
     * Transferred into RequestContext and masked in logs.
     */
    static readonly AUTHORIZATION = new PlatformHeader('authorization', true, true);

    static getAllHeaders(): PlatformHeader[] {
        return [AuthHeaders.AUTHORIZATION];
    }
}
