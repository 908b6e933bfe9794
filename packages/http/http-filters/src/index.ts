export { Filter, RouteResult } from './Filter';
export type { Service } from './Filter';
