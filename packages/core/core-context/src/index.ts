export { RequestContext, ContextKey } from './RequestContext';
