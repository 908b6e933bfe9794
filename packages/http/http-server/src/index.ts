export type { WebServer } from './WebServer';
export { WebServerFactory } from './WebServerFactory';
export { WebServerImpl } from './WebServerImpl';
export { WebMiddleware, ExpressWrapper } from './WebMiddleware';
export { ContextFilter } from './filters/ContextFilter';
export { LogApiFilter } from './filters/LogApiFilter';
export { ServerContextKeys } from './filters/ServerContextKeys';

export { CoreModule } from './modules/CoreModule';
export { CoreHeaders } from './headers/CoreHeaders';

// Extension points
export { SERVER_TYPES } from './extensions/ServerTypes';
export type { ExpressMiddlewareExtension } from './extensions/ExpressMiddlewareExtension';
export { HtmlResultWriter } from './extensions/ResultWriter';
export type { ResultWriter } from './extensions/ResultWriter';

// Express implementations of the router interfaces
export { ExpressRouterRequest } from './express/ExpressRouterRequest';
export { ExpressRouterResponse } from './express/ExpressRouterResponse';
