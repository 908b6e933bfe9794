/**
 * DI symbols for the platform headers system.
 *
 * Symbol.for() keeps the symbol identical across packages, which
 * @multiInject relies on when several modules bind the same token.
 */
export const HEADER_TYPES = {
    PlatformHeadersExtension: Symbol.for('PlatformHeadersExtension'),
};
