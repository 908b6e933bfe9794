import { RequestHandler } from 'express';

/**
 * Express middleware a module contributes, mounted ahead of every route in
 * the order the modules bound them.
 *
 * ```typescript
 * bind<ExpressMiddlewareExtension>(SERVER_TYPES.ExpressMiddlewareExtension)
 *     .toConstantValue(new OidcMiddlewareExtension(settings, serverConfig));
 * ```
 */
export interface ExpressMiddlewareExtension {
    /**
     * Shown in startup logs.
     */
    readonly name: string;

    createMiddleware(): RequestHandler;
}
