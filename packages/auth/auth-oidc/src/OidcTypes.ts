export const OIDC_TYPES = {
    OidcSettings: Symbol.for('OidcSettings'),
    SessionSecret: Symbol.for('SessionSecret'),
    OidcAccessor: Symbol.for('OidcAccessor'),
};
