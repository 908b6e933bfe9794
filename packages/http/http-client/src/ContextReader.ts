import { PlatformHeader, ContextReader } from '@oidc-quickstart/http-api';

/**
 * Asks several readers; the last one with a value wins.
 *
 * ```typescript
 * new CompositeContextReader([
 *     new RequestContextReader(CoreHeaders.getAllHeaders()),  // incoming request ids
 *     new BearerTokenContextReader(tokens),                    // authorization
 * ]);
 * ```
 */
export class CompositeContextReader implements ContextReader {
    constructor(private readers: ContextReader[]) {}

    read(header: PlatformHeader): string | undefined {
        for (let i = this.readers.length - 1; i >= 0; i--) {
            const value = this.readers[i].read(header);
            if (value !== undefined) {
                return value;
            }
        }
        return undefined;
    }
}
