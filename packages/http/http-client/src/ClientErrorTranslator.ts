import {
    ProtocolError,
    HttpBadRequestError,
    HttpUserError,
    HttpUnauthorizedError,
    HttpForbiddenError,
    HttpNotFoundError,
    HttpInternalServerError,
    HttpBadGatewayError,
    HttpError,
} from '@oidc-quickstart/http-api';

/**
 * Rebuilds typed HttpErrors from ProtocolError bodies; the reverse of
 * ExpressWrapper.handleError() on the server.
 */
export class ClientErrorTranslator {
    /**
     * Status code to error class, keeping the extra fields each one carries:
     * 266 HttpUserError, 400 HttpBadRequestError, 401, 403, 404, 500, 502.
     * Other codes become a plain HttpError with that code.
     */
    static translateError(status: number, statusText: string, protocolError: ProtocolError): HttpError {
        const message = protocolError.message || statusText || 'Unknown error';

        switch (status) {
            case 266:
                return new HttpUserError(message, protocolError.errorCode);
            case 400:
                return new HttpBadRequestError(message, protocolError.field, protocolError.guiAlertMessage);
            case 401:
                return new HttpUnauthorizedError(message, protocolError.subType);
            case 403:
                return new HttpForbiddenError(message);
            case 404:
                return new HttpNotFoundError(message);
            case 500:
                return new HttpInternalServerError(message);
            case 502:
                return new HttpBadGatewayError(message);
            default:
                return new HttpError(`${message} (could not translate statusCode=${status})`, status, protocolError.subType);
        }
    }

    /**
     * Picks the ProtocolError fields out of a parsed body, ignoring anything
     * that is not a string. Bodies that are not objects yield an empty error.
     */
    static parseProtocolError(body: unknown): ProtocolError {
        const protocolError = new ProtocolError();
        if (typeof body !== 'object' || body === null) {
            return protocolError;
        }

        const read = (field: string): string | undefined => {
            const value: unknown = Reflect.get(body, field);
            return typeof value === 'string' ? value : undefined;
        };

        protocolError.message = read('message');
        protocolError.subType = read('subType');
        protocolError.field = read('field');
        protocolError.name = read('name');
        protocolError.guiAlertMessage = read('guiAlertMessage');
        protocolError.errorCode = read('errorCode');
        return protocolError;
    }
}
