import { PlatformHeader } from './PlatformHeader';

/**
 * A set of platform headers contributed by one DI module.
 *
 * Each module binds its own extension to HEADER_TYPES.PlatformHeadersExtension
 * and the framework collects them all with @multiInject:
 * ```typescript
 * const authExtension = new PlatformHeadersExtension([AuthHeaders.AUTHORIZATION]);
 * bind(HEADER_TYPES.PlatformHeadersExtension).toConstantValue(authExtension);
 * ```
 */
export class PlatformHeadersExtension {
    readonly headers: PlatformHeader[];

    constructor(headers: PlatformHeader[]) {
        this.headers = headers;
    }

    getHeaders(): PlatformHeader[] {
        return this.headers;
    }
}
