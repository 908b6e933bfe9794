import { Request } from 'express';
import { RouterRequest } from '@oidc-quickstart/http-routing';

/**
 * RouterRequest over an Express request.
 */
export class ExpressRouterRequest implements RouterRequest {
    private headerCache?: Map<string, string>;

    constructor(private req: Request) {}

    getHeaders(): Map<string, string> {
        if (this.headerCache) {
            return this.headerCache;
        }

        const headers = new Map<string, string>();
        for (const [name, value] of Object.entries(this.req.headers)) {
            if (typeof value === 'string') {
                headers.set(name.toLowerCase(), value);
            } else if (Array.isArray(value)) {
                headers.set(name.toLowerCase(), value.join(', '));
            }
        }
        this.headerCache = headers;
        return headers;
    }

    getSingleHeaderValue(headerName: string): string | undefined {
        return this.getHeaders().get(headerName.toLowerCase());
    }

    /**
     * Every value of every header, for MethodMeta.requestHeaders.
     */
    getHeaderValues(): Map<string, string[]> {
        const headers = new Map<string, string[]>();
        for (const [name, value] of Object.entries(this.req.headers)) {
            if (typeof value === 'string') {
                headers.set(name.toLowerCase(), [value]);
            } else if (Array.isArray(value)) {
                headers.set(name.toLowerCase(), value);
            }
        }
        return headers;
    }

    getMethod(): string {
        return this.req.method;
    }

    getPath(): string {
        return this.req.path;
    }

    getOriginalUrl(): string {
        return this.req.originalUrl;
    }

    getQueryParams(): Map<string, string> {
        const params = new Map<string, string>();
        const query: Record<string, unknown> = this.req.query;
        for (const [name, value] of Object.entries(query)) {
            if (typeof value === 'string') {
                params.set(name, value);
            } else if (Array.isArray(value) && typeof value[0] === 'string') {
                params.set(name, value[0]);
            }
        }
        return params;
    }

    readBody(): Promise<string> {
        return new Promise((resolve, reject) => {
            let body = '';
            this.req.on('data', (chunk: Buffer) => {
                body += chunk.toString();
            });
            this.req.on('end', () => {
                resolve(body);
            });
            this.req.on('error', (err: Error) => {
                reject(err);
            });
        });
    }

    /**
     * The Express request, for code that needs what middleware attached to it.
     */
    getUnderlyingRequest(): Request {
        return this.req;
    }
}
