/**
 * Client side of the API contract: reads the same decorators as http-routing
 * and turns method calls into HTTP requests.
 */

export { createClient, ClientConfig, ProxyClient } from './ClientFactory';
export { ClientErrorTranslator } from './ClientErrorTranslator';

// Header propagation
export { CompositeContextReader } from './ContextReader';
export { ContextMgr } from './ContextMgr';
export type { ContextReader } from '@oidc-quickstart/http-api';
