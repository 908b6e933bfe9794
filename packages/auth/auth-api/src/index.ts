export { Claim, ClaimsPrincipal, ClaimTypes } from './claims';
export { AuthSchemes } from './AuthSchemes';
export type { AuthScheme } from './AuthSchemes';
export {
    AuthenticationProperties,
    LoginAuthenticationPropertiesBuilder,
    LogoutAuthenticationPropertiesBuilder,
} from './AuthenticationProperties';
export { ChallengeResult, SignOutResult } from './results';
export { TokenProvider } from './TokenProvider';
export type { InitialApplicationState } from './TokenProvider';
export { AuthContext, AuthContextKeys } from './AuthContext';
export { AuthHeaders } from './AuthHeaders';
export { BearerTokenContextReader } from './BearerTokenContextReader';
