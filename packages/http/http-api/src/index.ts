/**
 * API contract package, shared by the server (http-routing) and the
 * client (http-client):
 * ```
 * http-api (defines the contract)
 *    ↑
 *    ├── http-routing (server: contract → handlers)
 *    └── http-client (client: contract → HTTP requests)
 * ```
 */

export {
    ApiInterface,
    Get,
    Post,
    Put,
    Delete,
    Path,
    getRoutes,
    isApiInterface,
    RouteMetadata,
    METADATA_KEYS,
} from './decorators';

export type { ValidateImplementation } from './validators';

export {
    ProtocolError,
    HttpError,
    HttpNotFoundError,
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpUserError,
    ENTITY_NOT_FOUND,
    NOT_AUTHENTICATED,
    MISSING_BEARER_TOKEN,
} from './errors';

export { ActionResult, HtmlResult } from './results';

// Platform headers
export { PlatformHeader } from './PlatformHeader';
export { PlatformHeadersExtension } from './PlatformHeadersExtension';
export { HEADER_TYPES } from './HeaderTypes';
export { HeaderMethods } from './HeaderMethods';
export type { ContextReader } from './ContextReader';
export { LogApiCall } from './LogApiCall';

export { DateUtil } from './datetime';
export type { DateDto } from './datetime';
