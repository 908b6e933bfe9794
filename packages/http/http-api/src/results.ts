/**
 * Results a controller returns instead of a JSON DTO.
 *
 * The Express wrapper hands every result to the bound ResultWriters; plain
 * objects that no writer claims are sent as JSON.
 */
export abstract class ActionResult {
    /**
     * One-line summary used in API logs in place of the JSON body.
     */
    abstract describe(): string;
}

/**
 * A rendered HTML page.
 */
export class HtmlResult extends ActionResult {
    constructor(
        public readonly html: string,
        public readonly status: number = 200,
    ) {
        super();
    }

    describe(): string {
        return `HtmlResult(status=${this.status}, length=${this.html.length})`;
    }
}
