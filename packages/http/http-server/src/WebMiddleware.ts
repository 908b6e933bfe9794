import { Request, Response, NextFunction } from 'express';
import { injectable } from 'inversify';
import { provideSingleton, MethodMeta, RouterReqResp } from '@oidc-quickstart/http-routing';
import {
    ProtocolError,
    HttpError,
    HttpBadRequestError,
    HttpUserError,
    HttpNotFoundError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpInternalServerError,
    HttpBadGatewayError,
    RouteMetadata,
} from '@oidc-quickstart/http-api';
import { Service, RouteResult } from '@oidc-quickstart/http-filters';
import { RequestContext } from '@oidc-quickstart/core-context';
import { toError } from '@oidc-quickstart/core-util';
import { ExpressRouterRequest } from './express/ExpressRouterRequest';
import { ExpressRouterResponse } from './express/ExpressRouterResponse';
import { ResultWriter } from './extensions/ResultWriter';

/**
 * Express handler for one route. Owns the whole request/response cycle:
 * opens RequestContext, parses the request DTO, runs the filter chain and
 * writes the result or the error.
 */
export class ExpressWrapper {
    constructor(
        private service: Service<MethodMeta, RouteResult<unknown>>,
        private routeMeta: RouteMetadata,
        private resultWriters: ResultWriter[],
    ) {}

    public execute(req: Request, res: Response): Promise<void> {
        return RequestContext.run(() => this.executeInContext(req, res));
    }

    private async executeInContext(req: Request, res: Response): Promise<void> {
        const request = new ExpressRouterRequest(req);
        const reqResp = new RouterReqResp(request, new ExpressRouterResponse(res));

        try {
            const requestDto = await this.readRequestDto(request);
            const methodMeta = new MethodMeta(this.routeMeta, request.getHeaderValues(), requestDto, reqResp);

            const routeResult = await this.service.invoke(methodMeta);
            if (routeResult.response === undefined) {
                throw new Error(
                    `Route chain(filters & all) is not returning a response.  ${this.routeMeta.controllerClassName}.${this.routeMeta.methodName}`,
                );
            }

            await this.writeResult(routeResult.response, reqResp);
        } catch (err: unknown) {
            this.handleError(reqResp, err);
        }
    }

    /**
     * JSON body for POST/PUT, the query string otherwise.
     */
    private async readRequestDto(request: ExpressRouterRequest): Promise<unknown> {
        if (!['POST', 'PUT', 'PATCH'].includes(request.getMethod())) {
            return Object.fromEntries(request.getQueryParams());
        }

        const bodyText = await request.readBody();
        if (!bodyText) {
            return {};
        }
        try {
            return JSON.parse(bodyText);
        } catch (err: unknown) {
            throw new HttpBadRequestError(`Request body is not valid JSON: ${toError(err).message}`);
        }
    }

    private async writeResult(response: unknown, reqResp: RouterReqResp): Promise<void> {
        for (const writer of this.resultWriters) {
            if (await writer.tryWrite(response, reqResp)) {
                return;
            }
        }

        reqResp.response.setStatus(200);
        reqResp.response.setHeader('Content-Type', 'application/json');
        reqResp.response.send(JSON.stringify(response));
    }

    /**
     * Translates errors into a ProtocolError JSON body. Mirrors
     * ClientErrorTranslator on the client side:
     * - HttpUserError → 266 (with errorCode)
     * - HttpBadRequestError → 400 (with field, guiAlertMessage)
     * - HttpUnauthorizedError → 401
     * - HttpForbiddenError → 403
     * - HttpNotFoundError → 404
     * - HttpInternalServerError → 500
     * - HttpBadGatewayError → 502
     * - anything else → 500 'Internal Server Error'
     *
     * A browser (Accept naming text/html) gets an HTML error page with the
     * same status instead.
     */
    public handleError(reqResp: RouterReqResp, error: unknown): void {
        const response = reqResp.response;
        if (response.isHeadersSent()) {
            console.error('[ExpressWrapper] Error after response was sent:', toError(error).message);
            return;
        }

        const protocolError = new ProtocolError();
        let status = 500;

        if (!(error instanceof HttpError)) {
            console.error('[ExpressWrapper] Unexpected error:', toError(error));
            protocolError.message = 'Internal Server Error';
        } else {
            status = error.code;
            protocolError.message = error.message;
            protocolError.subType = error.subType;
            protocolError.name = error.name;

            if (error instanceof HttpUserError) {
                console.log('[ExpressWrapper] User Error:', error.message);
                protocolError.errorCode = error.errorCode;
            } else if (error instanceof HttpBadRequestError) {
                console.log('[ExpressWrapper] Bad Request:', error.message);
                protocolError.field = error.field;
                protocolError.guiAlertMessage = error.guiMessage;
            } else if (error instanceof HttpNotFoundError) {
                console.log('[ExpressWrapper] Not Found:', error.message);
            } else if (error instanceof HttpUnauthorizedError) {
                console.log('[ExpressWrapper] Unauthorized:', error.message);
            } else if (error instanceof HttpForbiddenError) {
                console.log('[ExpressWrapper] Forbidden:', error.message);
            } else if (error instanceof HttpInternalServerError) {
                console.error('[ExpressWrapper] Internal Server Error:', error.message);
            } else if (error instanceof HttpBadGatewayError) {
                console.error('[ExpressWrapper] Bad Gateway:', error.message);
            } else {
                console.log('[ExpressWrapper] Generic HttpError:', error.message);
            }
        }

        response.setStatus(status);
        if (wantsHtml(reqResp)) {
            response.setHeader('Content-Type', 'text/html; charset=utf-8');
            response.send(renderErrorPage(status));
            return;
        }
        response.setHeader('Content-Type', 'application/json');
        response.send(JSON.stringify(protocolError));
    }
}

const ERROR_PAGE_TITLES = new Map<number, string>([
    [400, 'Bad request'],
    [401, 'Login required'],
    [403, 'Access denied'],
    [404, 'Page not found'],
    [502, 'Upstream service unavailable'],
]);

function wantsHtml(reqResp: RouterReqResp): boolean {
    return reqResp.request.getSingleHeaderValue('accept')?.includes('text/html') ?? false;
}

/**
 * Error page for browsers. Error messages stay in the logs.
 */
function renderErrorPage(status: number): string {
    const title = ERROR_PAGE_TITLES.get(status) ?? 'Something went wrong';
    return [
        '<!DOCTYPE html>',
        '<html>',
        `<head><title>${title}</title></head>`,
        '<body>',
        `<h1>${status} ${title}</h1>`,
        '<p><a href="/">Back to the home page</a></p>',
        '</body>',
        '</html>',
    ].join('\n');
}

/**
 * Express-level middleware mounted by WebServerImpl ahead of any route.
 */
@provideSingleton()
@injectable()
export class WebMiddleware {
    /**
     * Outermost safety net: anything escaping a route or a middleware
     * extension becomes an HTML 500 page. Registered as an Express error
     * handler, so it must keep all four parameters.
     */
    globalErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
        const error = toError(err);
        console.error(`[GlobalErrorHandler] Unhandled error on ${req.method} ${req.path}:`, error);
        if (res.headersSent) {
            next(error);
            return;
        }
        res.status(500).setHeader('Content-Type', 'text/html; charset=utf-8').send(
            [
                '<!DOCTYPE html>',
                '<html>',
                '<head><title>Server Error</title></head>',
                '<body>',
                '<h1>You hit a server error</h1>',
                '<p>An unexpected error occurred while processing your request.</p>',
                '</body>',
                '</html>',
            ].join('\n'),
        );
    }

    /**
     * One line per request once the response is finished.
     */
    logRequests(req: Request, res: Response, next: NextFunction): void {
        const start = Date.now();
        res.on('finish', () => {
            console.log(`[WebMiddleware] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - start}ms)`);
        });
        next();
    }

    createExpressWrapper(
        service: Service<MethodMeta, RouteResult<unknown>>,
        routeMeta: RouteMetadata,
        resultWriters: ResultWriter[],
    ): ExpressWrapper {
        return new ExpressWrapper(service, routeMeta, resultWriters);
    }
}
