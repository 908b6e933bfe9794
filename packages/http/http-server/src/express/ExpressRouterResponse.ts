import { Response } from 'express';
import { RouterResponse } from '@oidc-quickstart/http-routing';

/**
 * RouterResponse over an Express response.
 */
export class ExpressRouterResponse implements RouterResponse {
    constructor(private res: Response) {}

    setStatus(code: number): void {
        this.res.status(code);
    }

    setHeader(name: string, value: string): void {
        this.res.setHeader(name, value);
    }

    send(body: string): void {
        this.res.send(body);
    }

    isHeadersSent(): boolean {
        return this.res.headersSent;
    }

    /**
     * The Express response, for code that needs what middleware attached to it.
     */
    getUnderlyingResponse(): Response {
        return this.res;
    }
}
