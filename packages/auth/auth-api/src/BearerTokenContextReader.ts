import { ContextReader, PlatformHeader } from '@oidc-quickstart/http-api';
import { AuthHeaders } from './AuthHeaders';
import { TokenProvider } from './TokenProvider';

/**
 * Supplies `Authorization: Bearer <access token>` from a TokenProvider.
 * Every other header reads as absent.
 */
export class BearerTokenContextReader implements ContextReader {
    constructor(private tokenProvider: TokenProvider) {}

    read(header: PlatformHeader): string | undefined {
        if (header.headerName !== AuthHeaders.AUTHORIZATION.headerName) {
            return undefined;
        }
        const accessToken = this.tokenProvider.accessToken;
        return accessToken ? `Bearer ${accessToken}` : undefined;
    }
}
