import { HttpBadRequestError, HttpUnauthorizedError, RouteMetadata } from '@oidc-quickstart/http-api';
import { RouteResult } from '@oidc-quickstart/http-filters';
import { MethodMeta, RouterReqResp, RouterRequest, RouterResponse } from '@oidc-quickstart/http-routing';
import { ExpressWrapper } from '../WebMiddleware';

class RecordingResponse implements RouterResponse {
    status?: number;
    headers = new Map<string, string>();
    body?: string;

    setStatus(code: number): void {
        this.status = code;
    }

    setHeader(name: string, value: string): void {
        this.headers.set(name, value);
    }

    send(body: string): void {
        this.body = body;
    }

    isHeadersSent(): boolean {
        return this.body !== undefined;
    }
}

class AcceptRequest implements RouterRequest {
    constructor(private accept?: string) {}

    getHeaders(): Map<string, string> {
        return this.accept === undefined ? new Map() : new Map([['accept', this.accept]]);
    }

    getSingleHeaderValue(headerName: string): string | undefined {
        return this.getHeaders().get(headerName.toLowerCase());
    }

    getMethod(): string {
        return 'GET';
    }

    getPath(): string {
        return '/fetchdata';
    }

    getOriginalUrl(): string {
        return '/fetchdata';
    }

    getQueryParams(): Map<string, string> {
        return new Map();
    }

    async readBody(): Promise<string> {
        return '';
    }
}

const wrapper = new ExpressWrapper(
    { invoke: async (meta: MethodMeta) => new RouteResult<unknown>(meta.path) },
    new RouteMetadata('fetchData'),
    [],
);

describe('ExpressWrapper.handleError', () => {
    it('should answer API clients with ProtocolError JSON', () => {
        const response = new RecordingResponse();

        wrapper.handleError(
            new RouterReqResp(new AcceptRequest(), response),
            new HttpBadRequestError('name is required', 'name'),
        );

        expect(response.status).toBe(400);
        expect(response.headers.get('Content-Type')).toBe('application/json');
        expect(JSON.parse(response.body ?? '')).toMatchObject({ message: 'name is required', field: 'name' });
    });

    it('should answer browsers with an HTML page of the same status', () => {
        const response = new RecordingResponse();

        wrapper.handleError(
            new RouterReqResp(new AcceptRequest('text/html,application/xhtml+xml,*/*;q=0.8'), response),
            new HttpUnauthorizedError('Bearer token required for /api/forecasts'),
        );

        expect(response.status).toBe(401);
        expect(response.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
        expect(response.body).toContain('<h1>401 Login required</h1>');
        expect(response.body).not.toContain('Bearer token required');
    });

    it('should hide unexpected errors behind a 500', () => {
        const json = new RecordingResponse();
        const html = new RecordingResponse();

        wrapper.handleError(new RouterReqResp(new AcceptRequest(), json), new Error('db password wrong'));
        wrapper.handleError(new RouterReqResp(new AcceptRequest('text/html'), html), new Error('db password wrong'));

        expect(json.status).toBe(500);
        expect(json.body).toBe('{"message":"Internal Server Error"}');
        expect(html.status).toBe(500);
        expect(html.body).toContain('<h1>500 Something went wrong</h1>');
    });

    it('should leave a response alone once it was sent', () => {
        const response = new RecordingResponse();
        response.send('<p>partial</p>');

        wrapper.handleError(new RouterReqResp(new AcceptRequest(), response), new Error('late'));

        expect(response.status).toBeUndefined();
        expect(response.body).toBe('<p>partial</p>');
    });
});
