// API decorators, re-exported so controllers need one import
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
} from '@oidc-quickstart/http-api';
export type { ValidateImplementation } from '@oidc-quickstart/http-api';

// Server-side decorators
export {
    Controller,
    isController,
    SourceFile,
    getSourceFile,
    provideSingleton,
    ROUTING_METADATA_KEYS,
} from './decorators';

export { RESTApiRoutes } from './RESTApiRoutes';
export type { ClassType } from './RESTApiRoutes';

export { RouteDefinition, FilterDefinition, WEBAPP_META_TOKEN } from './WebAppMeta';
export type { WebAppMeta, Routes, RouteBuilder, HttpFilter } from './WebAppMeta';

export { MethodMeta } from './MethodMeta';
export { RouteHandler } from './RouteHandler';
export { RouteBuilderImpl, RouteHandlerImpl, RouteHandlerWithMeta } from './RouteBuilderImpl';
export { FilterMatcher, FilterWithMeta } from './FilterMatcher';

// Express-independent request/response
export type { RouterRequest } from './RouterRequest';
export type { RouterResponse } from './RouterResponse';
export { RouterReqResp } from './RouterReqResp';
export { RequestContextReader } from './RequestContextReader';

export { ServerConfig, SERVER_CONFIG_TOKEN } from './ServerConfig';
