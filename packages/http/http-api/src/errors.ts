/**
 * HTTP error classes shared by server and client.
 */

/**
 * Error response body. Serialized by the server, parsed back by the client.
 */
export class ProtocolError {
    public message?: string;
    public subType?: string;
    public field?: string;
    public name?: string;
    public guiAlertMessage?: string;
    public errorCode?: string;
}

/**
 * Base error class carrying an HTTP status code.
 */
export class HttpError extends Error {
    public code: number;
    public subType?: string;
    public readonly httpCause?: Error;

    constructor(message: string, code: number, subType?: string, cause?: Error) {
        super(message);
        this.code = code;
        this.subType = subType;
        this.httpCause = cause;
    }
}

// Error subtypes
export const ENTITY_NOT_FOUND = 'EntityNotFoundError';
export const NOT_AUTHENTICATED = 'notAuthenticated';
export const MISSING_BEARER_TOKEN = 'missingBearerToken';

export class HttpNotFoundError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 404, undefined, cause);
        this.name = ENTITY_NOT_FOUND;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * 400 Bad Request, with the offending field and a message fit for the GUI.
 */
export class HttpBadRequestError extends HttpError {
    public field?: string;
    public guiMessage?: string;

    constructor(message: string, field?: string, guiMessage?: string, cause?: Error) {
        super(message, 400, undefined, cause);
        this.name = 'BadRequest';
        this.field = field;
        this.guiMessage = guiMessage;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpUnauthorizedError extends HttpError {
    constructor(message: string, subType?: string, cause?: Error) {
        super(message, 401, subType, cause);
        this.name = 'Unauthorized';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpForbiddenError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 403, undefined, cause);
        this.name = 'Forbidden';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class HttpInternalServerError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 500, undefined, cause);
        this.name = 'InternalServerError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * 502, raised when a downstream service answers with something unusable.
 */
export class HttpBadGatewayError extends HttpError {
    constructor(message: string, cause?: Error) {
        super(message, 502, undefined, cause);
        this.name = 'HttpBadGatewayError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * User mistake reported with status 266.
 *
 * The status stays in the 2xx range so that expected user errors do not
 * show up as failures in browser tools and error monitoring.
 */
export class HttpUserError extends HttpError {
    public errorCode?: string;

    constructor(message: string, errorCode?: string, cause?: Error) {
        super(message, 266, 'USER_ERROR', cause);
        this.name = 'UserError';
        this.errorCode = errorCode;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
