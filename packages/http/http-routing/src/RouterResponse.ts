/**
 * Minimal view of an HTTP response, so filters and result writers need not
 * depend on Express.
 */
export interface RouterResponse {
    setStatus(code: number): void;

    setHeader(name: string, value: string): void;

    /**
     * Send the body and end the response.
     */
    send(body: string): void;

    isHeadersSent(): boolean;
}
