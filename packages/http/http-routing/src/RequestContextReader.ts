import { PlatformHeader, ContextReader } from '@oidc-quickstart/http-api';
import { RequestContext } from '@oidc-quickstart/core-context';

/**
 * Reads headers from the active RequestContext.
 *
 * Given a header list, only those headers are answered; everything else
 * reads as absent.
 *
 * Lives here rather than in http-client because RequestContext needs
 * AsyncLocalStorage and so only runs on the server.
 */
export class RequestContextReader implements ContextReader {
    constructor(private readonly allowed?: PlatformHeader[]) {}

    read(header: PlatformHeader): string | undefined {
        if (this.allowed && !this.allowed.some((h) => h.headerName === header.headerName)) {
            return undefined;
        }
        return RequestContext.getHeader(header);
    }
}
