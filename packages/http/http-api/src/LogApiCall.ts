import { RouteMetadata } from './decorators';
import {
    HttpBadRequestError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpUserError,
} from './errors';
import { ActionResult } from './results';
import { toError } from '@oidc-quickstart/core-util';

/**
 * API call logging shared by LogApiFilter (server) and the HTTP client.
 *
 * Formats:
 * - [API-{type}-req] Class.method /path request={...} headers={...}
 * - [API-{type}-resp-SUCCESS] Class.method response={...}
 * - [API-{type}-resp-OTHER] Class.method errorType=...   (user errors)
 * - [API-{type}-resp-FAIL] Class.method errorType=... error=...   (server errors)
 */
export class LogApiCall {
    /**
     * @param type - 'SVR' or 'CLIENT'
     * @param headers - already masked header values
     */
    public async execute<T>(
        type: string,
        meta: RouteMetadata,
        requestDto: unknown,
        headers: Map<string, string>,
        method: (dto: unknown) => Promise<T>,
    ): Promise<T> {
        const classMethod = `${meta.controllerClassName ?? 'Unknown'}.${meta.methodName}`;
        console.log(
            `[API-${type}-req] ${classMethod} ${meta.path} request=${LogApiCall.stringify(requestDto)} headers=${JSON.stringify(Object.fromEntries(headers))}`,
        );

        try {
            const response = await method(requestDto);
            console.log(`[API-${type}-resp-SUCCESS] ${classMethod} response=${LogApiCall.stringify(response)}`);
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            const errorType = error.constructor.name;

            if (LogApiCall.isUserError(error)) {
                console.log(`[API-${type}-resp-OTHER] ${classMethod} errorType=${errorType}`);
            } else {
                console.error(`[API-${type}-resp-FAIL] ${classMethod} errorType=${errorType} error=${error.message}`);
            }
            throw error;
        }
    }

    /**
     * User errors are expected behavior, logged as OTHER without a stack:
     * 400, 401, 403, 404 and 266.
     */
    static isUserError(error: unknown): boolean {
        return (
            error instanceof HttpBadRequestError ||
            error instanceof HttpUnauthorizedError ||
            error instanceof HttpForbiddenError ||
            error instanceof HttpNotFoundError ||
            error instanceof HttpUserError
        );
    }

    private static stringify(value: unknown): string {
        if (value instanceof ActionResult) {
            return value.describe();
        }
        return JSON.stringify(value);
    }
}
