import { RouterRequest } from './RouterRequest';
import { RouterResponse } from './RouterResponse';

/**
 * The request and response of one HTTP exchange.
 */
export class RouterReqResp {
    constructor(
        public readonly request: RouterRequest,
        public readonly response: RouterResponse,
    ) {}
}
