/**
 * DI symbols for the server's extension points.
 * All are collected from the application container with getAll/@multiInject.
 */
export const SERVER_TYPES = {
    ExpressMiddlewareExtension: Symbol.for('ExpressMiddlewareExtension'),
    ResultWriter: Symbol.for('ResultWriter'),
    /**
     * The application container itself, for code that opens child scopes.
     */
    AppContainer: Symbol.for('AppContainer'),
};
