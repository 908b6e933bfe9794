import { PlatformHeader } from './PlatformHeader';

/**
 * Reads header values from wherever the current environment keeps them.
 *
 * Implementations:
 * - RequestContextReader (http-routing): the active RequestContext
 * - CompositeContextReader (http-client): several readers, last one wins
 * - BearerTokenContextReader (auth-api): an access token held by a component
 */
export interface ContextReader {
    read(header: PlatformHeader): string | undefined;
}
