/**
 * Minimal view of an HTTP request, so filters need not depend on Express.
 *
 * Implementations:
 * - ExpressRouterRequest (http-server)
 * - hand-written stubs in tests
 */
export interface RouterRequest {
    /**
     * All headers, lowercase name to value.
     */
    getHeaders(): Map<string, string>;

    getSingleHeaderValue(headerName: string): string | undefined;

    getMethod(): string;

    getPath(): string;

    /**
     * Path plus query string, as the browser asked for it.
     */
    getOriginalUrl(): string;

    /**
     * Single-valued query parameters. Repeated parameters keep their first value.
     */
    getQueryParams(): Map<string, string>;

    readBody(): Promise<string>;
}
