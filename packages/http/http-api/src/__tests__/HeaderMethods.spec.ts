import { HeaderMethods } from '../HeaderMethods';
import { PlatformHeader } from '../PlatformHeader';
import { ContextReader } from '../ContextReader';

class MapReader implements ContextReader {
    constructor(private values: Map<string, string>) {}

    read(header: PlatformHeader): string | undefined {
        return this.values.get(header.headerName);
    }
}

describe('HeaderMethods', () => {
    const headerMethods = new HeaderMethods();
    const REQUEST_ID = new PlatformHeader('X-Request-Id');
    const AUTHORIZATION = new PlatformHeader('authorization', true, true);
    const LOCAL_ONLY = new PlatformHeader('x-local-only', false);

    it('should lowercase header names', () => {
        expect(REQUEST_ID.getHeaderName()).toBe('x-request-id');
    });

    it('should keep only transferable headers', () => {
        expect(headerMethods.findTransferHeaders([REQUEST_ID, LOCAL_ONLY, AUTHORIZATION])).toEqual([
            REQUEST_ID,
            AUTHORIZATION,
        ]);
        expect(headerMethods.secureHeaders([REQUEST_ID, AUTHORIZATION])).toEqual([AUTHORIZATION]);
    });

    it('should mask secrets by length', () => {
        expect(headerMethods.maskSecureValue('short')).toBe('<secure key too short to log>');
        expect(headerMethods.maskSecureValue('Bearer abc')).toBe('Be...');
        expect(headerMethods.maskSecureValue('Bearer test-access-token')).toBe('Bea...ken');
    });

    it('should mask secured headers and skip missing ones when building log maps', () => {
        const reader = new MapReader(
            new Map([
                ['x-request-id', 'req-123'],
                ['authorization', 'Bearer test-access-token'],
            ]),
        );

        const result = headerMethods.buildSecureMapForLogs([REQUEST_ID, AUTHORIZATION, LOCAL_ONLY], reader);

        expect(result).toEqual(
            new Map([
                ['x-request-id', 'req-123'],
                ['authorization', 'Bea...ken'],
            ]),
        );
    });
});
