/**
 * Error normalisation for catch blocks.
 *
 * Every catch block in the code base funnels the caught value through
 * toError() before logging, wrapping or re-throwing it:
 * ```typescript
 * try {
 *     await res.oidc.login(options);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     console.error('[OidcResultWriter] Login challenge failed:', error.message);
 *     throw error;
 * }
 * ```
 */

interface ErrorLike {
    message: unknown;
    name?: unknown;
    stack?: unknown;
}

function isErrorLike(value: object): value is ErrorLike {
    return 'message' in value;
}

function fromErrorLike(value: ErrorLike): Error {
    const error = new Error(String(value.message));
    if (typeof value.stack === 'string') {
        error.stack = value.stack;
    }
    if (typeof value.name === 'string') {
        error.name = value.name;
    }
    return error;
}

function describeObject(value: object): string {
    try {
        return `Non-Error object thrown: ${JSON.stringify(value)}`;
    } catch (err: unknown) {
        // Circular structures land here; recursing into toError() is not an option.
        void err;
        return 'Non-Error object thrown (unable to stringify)';
    }
}

/**
 * Converts any thrown value into an Error.
 *
 * - Error instances (and subclasses) are returned as-is.
 * - Objects carrying a `message` become an Error keeping that message, plus
 *   `name` and `stack` when they are strings.
 * - Other objects are JSON-stringified into the message.
 * - null/undefined and primitives are stringified.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        if (isErrorLike(err)) {
            return fromErrorLike(err);
        }
        return new Error(describeObject(err));
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}
