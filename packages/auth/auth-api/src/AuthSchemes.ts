/**
 * Names of the two cooperating authentication schemes: the OIDC handler
 * that talks to the identity provider, and the local session cookie it
 * signs the user into.
 */
export const AuthSchemes = {
    OIDC: 'oidc',
    COOKIE: 'cookies',
} as const;

export type AuthScheme = (typeof AuthSchemes)[keyof typeof AuthSchemes];
