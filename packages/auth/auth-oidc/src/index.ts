export { OidcSettings } from './OidcSettings';
export { buildOidcConfig, buildScope, toIssuerBaseUrl } from './OidcConfig';
export type { AuthorizationParameters } from './OidcConfig';
export { OIDC_TYPES } from './OidcTypes';
export { ExpressOidcAccessor } from './OidcAccessor';
export type { OidcAccessor, OidcSessionView, OidcResponseView } from './OidcAccessor';
export { claimsFromUser } from './claimsFromUser';
export { OidcMiddlewareExtension } from './OidcMiddlewareExtension';
export { OidcResultWriter } from './OidcResultWriter';
export { AuthContextFilter } from './filters/AuthContextFilter';
export { RequireAuthFilter } from './filters/RequireAuthFilter';
export { BearerTokenFilter, BEARER_TOKEN } from './filters/BearerTokenFilter';
export { createOidcModule } from './OidcModule';
