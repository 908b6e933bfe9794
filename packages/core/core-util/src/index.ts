/**
 * @oidc-quickstart/core-util
 *
 * Dependency-free helpers shared by every other package.
 * Works in both browser and Node.js environments.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
export { Header } from './Header';
