import { Header } from '@oidc-quickstart/core-util';

/**
 * An HTTP header the platform knows how to carry between services.
 *
 * The header name doubles as its key in RequestContext.
 */
export class PlatformHeader implements Header {
    /**
     * Lowercase HTTP header name, e.g. 'x-request-id'.
     */
    readonly headerName: string;

    /**
     * Copied from the incoming request into RequestContext when true.
     */
    readonly isWantTransferred: boolean;

    /**
     * Masked in logs when true (tokens, API keys).
     */
    readonly isSecured: boolean;

    readonly isDimensionForMetrics: boolean;

    constructor(
        headerName: string,
        isWantTransferred: boolean = true,
        isSecured: boolean = false,
        isDimensionForMetrics: boolean = false,
    ) {
        this.headerName = headerName.toLowerCase();
        this.isWantTransferred = isWantTransferred;
        this.isSecured = isSecured;
        this.isDimensionForMetrics = isDimensionForMetrics;
    }

    getHeaderName(): string {
        return this.headerName;
    }
}
