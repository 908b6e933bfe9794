/**
 * Header - the smallest view of an HTTP header definition.
 *
 * Lives in core-util so that core-context can store header values without
 * depending on http-api, where PlatformHeader implements it.
 */
export interface Header {
    /**
     * The HTTP header name (e.g. 'x-request-id', 'authorization').
     * Also the key the value is stored under in RequestContext.
     */
    getHeaderName(): string;
}
