import { PlatformHeader, ContextReader } from '@oidc-quickstart/http-api';

/**
 * Which headers an HTTP client forwards, and where their values come from.
 *
 * ```typescript
 * // server side, forwarding the incoming request's headers
 * new ContextMgr(new RequestContextReader(), CoreHeaders.getAllHeaders());
 *
 * // a component calling an API with the user's access token
 * new ContextMgr(new BearerTokenContextReader(tokenProvider), [AuthHeaders.AUTHORIZATION]);
 * ```
 */
export class ContextMgr {
    constructor(
        public readonly contextReader: ContextReader,
        public readonly headerSet: PlatformHeader[],
    ) {}

    /**
     * Value to send for one header name. Undefined when the header is not in
     * the set, is not transferable, or has no non-empty value.
     */
    read(headerName: string): string | undefined {
        const header = this.headerSet.find((h) => h.headerName === headerName.toLowerCase());
        if (!header || !header.isWantTransferred) {
            return undefined;
        }

        const value = this.contextReader.read(header);
        return value ? value : undefined;
    }

    /**
     * Every header in the set that currently has a value.
     */
    readAll(): Map<string, string> {
        const values = new Map<string, string>();
        for (const header of this.headerSet) {
            const value = this.read(header.headerName);
            if (value) {
                values.set(header.headerName, value);
            }
        }
        return values;
    }
}
