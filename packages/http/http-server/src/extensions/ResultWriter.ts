import { HtmlResult } from '@oidc-quickstart/http-api';
import { RouterReqResp } from '@oidc-quickstart/http-routing';

/**
 * Writes a controller result that is not a plain JSON DTO.
 *
 * The Express wrapper offers each result to every bound writer in turn; the
 * first one returning true has written the response. Unclaimed results are
 * sent as JSON.
 */
export interface ResultWriter {
    tryWrite(result: unknown, reqResp: RouterReqResp): Promise<boolean>;
}

export class HtmlResultWriter implements ResultWriter {
    async tryWrite(result: unknown, reqResp: RouterReqResp): Promise<boolean> {
        if (!(result instanceof HtmlResult)) {
            return false;
        }
        reqResp.response.setStatus(result.status);
        reqResp.response.setHeader('Content-Type', 'text/html; charset=utf-8');
        reqResp.response.send(result.html);
        return true;
    }
}
