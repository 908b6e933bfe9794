import * as path from 'path';
import { loadAppSettings, parseAppSettings, SettingsError } from '../src/config/AppSettings';
import { TEST_SETTINGS } from './TestServer';

function violationsOf(fn: () => unknown): string[] {
    try {
        fn();
    } catch (err: unknown) {
        if (err instanceof SettingsError) {
            return err.violations;
        }
        throw err;
    }
    throw new Error('Expected a SettingsError');
}

describe('parseAppSettings', () => {
    it('should parse the sections into typed settings', () => {
        const settings = parseAppSettings(TEST_SETTINGS, {});

        expect(settings.auth.domain).toBe('tenant.idp.test');
        expect(settings.auth.useRefreshTokens).toBe(true);
        expect(settings.auth.callbackPath).toBe('/callback');
        expect(settings.server.port).toBe(3000);
    });

    it('should default both base URLs from the port', () => {
        const settings = parseAppSettings({ ...TEST_SETTINGS, server: { port: 4000, sessionSecret: 'test-session-secret' } }, {});

        expect(settings.server.baseUrl).toBe('http://localhost:4000');
        expect(settings.forecastApi.baseUrl).toBe('http://localhost:4000');
    });

    it('should let the environment override the file', () => {
        const settings = parseAppSettings(TEST_SETTINGS, {
            AUTH_DOMAIN: 'other.idp.test',
            AUTH_CLIENT_ID: 'env-client',
            AUTH_CLIENT_SECRET: 'env-secret',
            AUTH_AUDIENCE: 'https://api.test',
            SESSION_SECRET: 'env-session-secret',
            PORT: '8081',
            BASE_URL: 'https://quickstart.test/',
        });

        expect(settings.auth.domain).toBe('other.idp.test');
        expect(settings.auth.clientId).toBe('env-client');
        expect(settings.auth.clientSecret).toBe('env-secret');
        expect(settings.auth.audience).toBe('https://api.test');
        expect(settings.server.sessionSecret).toBe('env-session-secret');
        expect(settings.server.port).toBe(8081);
        expect(settings.server.baseUrl).toBe('https://quickstart.test');
        expect(settings.forecastApi.baseUrl).toBe('https://quickstart.test');
    });

    it('should list every failing property path', () => {
        const violations = violationsOf(() =>
            parseAppSettings({ auth: { domain: '', clientId: 'test-client' }, server: { port: 3000 } }, {}),
        );

        expect(violations).toContain('auth.domain: domain should not be empty');
        expect(violations).toContain('server.sessionSecret: sessionSecret should not be empty');
    });

    it('should reject a non-numeric PORT', () => {
        const violations = violationsOf(() => parseAppSettings(TEST_SETTINGS, { PORT: 'abc' }));

        expect(violations).toContain('server.port: port must be an integer number');
    });
});

describe('loadAppSettings', () => {
    it('should read the shipped settings file', () => {
        const settings = loadAppSettings({});

        expect(settings.auth.domain).toBe('your-tenant.example-idp.com');
        expect(settings.server.baseUrl).toBe('http://localhost:3000');
    });

    it('should name a settings file it cannot read', () => {
        const missing = path.join(__dirname, 'no-such-settings.json');

        expect(() => loadAppSettings({ SETTINGS_FILE: missing })).toThrow(`Cannot read settings file ${missing}`);
    });
});
