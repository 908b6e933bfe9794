import { PlatformHeader } from './PlatformHeader';
import { ContextReader } from './ContextReader';

/**
 * Stateless helpers for filtering platform headers and masking them in logs.
 *
 * Bound as a singleton on the server and created with `new` by the HTTP client.
 */
export class HeaderMethods {
    findTransferHeaders(headers: PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isWantTransferred);
    }

    secureHeaders(headers: PlatformHeader[]): PlatformHeader[] {
        return headers.filter((h) => h.isSecured);
    }

    /**
     * Reads every header through the reader and masks the secured ones.
     * Headers without a value are left out.
     */
    buildSecureMapForLogs(platformHeaders: PlatformHeader[], contextReader: ContextReader): Map<string, string> {
        const headers = new Map<string, string>();

        for (const header of platformHeaders) {
            const value = contextReader.read(header);
            if (!value) {
                continue;
            }
            headers.set(header.headerName, header.isSecured ? this.maskSecureValue(value) : value);
        }

        return headers;
    }

    /**
     * Masks a secret by length:
     * - longer than 15: first 3 and last 3 characters
     * - 8 to 15: first 2 characters
     * - shorter than 8: nothing at all
     */
    maskSecureValue(value: string): string {
        const len = value.length;

        if (len < 8) {
            return '<secure key too short to log>';
        } else if (len <= 15) {
            return `${value.substring(0, 2)}...`;
        }
        return `${value.substring(0, 3)}...${value.substring(len - 3)}`;
    }
}
