import { AuthHeaders, ChallengeResult, TokenProvider } from '@oidc-quickstart/auth-api';
import { RequestContext } from '@oidc-quickstart/core-context';
import { HttpBadGatewayError, HttpUnauthorizedError, MISSING_BEARER_TOKEN } from '@oidc-quickstart/http-api';
import { CoreHeaders } from '@oidc-quickstart/http-server';
import { FetchDataApiPrototype, HomeApiPrototype, ProfileApiPrototype } from '../src/api/PageApi';
import { WeatherForecastService } from '../src/services/WeatherForecastService';
import { safeImageUrl } from '../src/ui/pages/ProfilePage';
import { createTestServer, RecordingForecastClientFactory } from './TestServer';

const JANE = {
    sub: 'idp|42',
    name: 'Jane Doe',
    nickname: 'jane',
    email: 'jane@example.test',
    picture: 'https://img.example.test/jane.png',
};

describe('Home page', () => {
    it('should offer a login link back to the page for anonymous users', async () => {
        const { server } = await createTestServer();
        const homeApi = server.createApiClient(HomeApiPrototype);

        const result = await RequestContext.run(() => homeApi.index());

        expect(result.status).toBe(200);
        expect(result.html).toContain('<a href="/account/login?redirectUri=%2F">Log in</a>');
        expect(result.html).not.toContain('Log out');
    });

    it('should greet signed-in users by name', async () => {
        const { server, oidc } = await createTestServer();
        oidc.signIn(JANE);
        const homeApi = server.createApiClient(HomeApiPrototype);

        const result = await RequestContext.run(() => homeApi.index());

        expect(result.html).toContain('<span>Hello, Jane Doe!</span>');
        expect(result.html).toContain('<a href="/account/logout">Log out</a>');
    });

    it('should render inside the host page and layout', async () => {
        const { server } = await createTestServer();
        const homeApi = server.createApiClient(HomeApiPrototype);

        const result = await RequestContext.run(() => homeApi.index());

        expect(result.html.startsWith('<!DOCTYPE html>\n<html lang="en">')).toBe(true);
        expect(result.html).toContain('<title>Home</title>');
        expect(result.html).toContain('<li><a href="/" class="active">Home</a></li>');
        expect(result.html).toContain('<li><a href="/profile">Profile</a></li>');
    });
});

describe('Profile page', () => {
    it('should show the name, email and picture claims', async () => {
        const { server, oidc } = await createTestServer();
        oidc.signIn(JANE);
        const profileApi = server.createApiClient(ProfileApiPrototype);

        const result = await RequestContext.run(() => profileApi.profile());

        expect(result.html).toContain('<img src="https://img.example.test/jane.png" alt="" class="avatar" />');
        expect(result.html).toContain('<h2>Jane Doe</h2>');
        expect(result.html).toContain('<p>jane@example.test</p>');
    });

    it('should fall back to the nickname and empty strings', async () => {
        const { server, oidc } = await createTestServer();
        oidc.signIn({ sub: 'idp|7', nickname: 'sam' });
        const profileApi = server.createApiClient(ProfileApiPrototype);

        const result = await RequestContext.run(() => profileApi.profile());

        expect(result.html).toContain('<img src="" alt="" class="avatar" />');
        expect(result.html).toContain('<h2>sam</h2>');
    });

    it('should escape claim values', async () => {
        const { server, oidc } = await createTestServer();
        oidc.signIn({ sub: 'idp|9', name: '<b>Eve & "Co"</b>' });
        const profileApi = server.createApiClient(ProfileApiPrototype);

        const result = await RequestContext.run(() => profileApi.profile());

        expect(result.html).toContain('<h2>&lt;b&gt;Eve &amp; &quot;Co&quot;&lt;/b&gt;</h2>');
    });

    it('should leave out pictures that are not http(s) URLs', async () => {
        const { server, oidc } = await createTestServer();
        oidc.signIn({ sub: 'idp|11', name: 'Mallory', picture: 'javascript:alert(1)' });
        const profileApi = server.createApiClient(ProfileApiPrototype);

        const result = await RequestContext.run(() => profileApi.profile());

        expect(result.html).toContain('<img src="" alt="" class="avatar" />');
        expect(result.html).not.toContain('javascript:');
    });

    it('should challenge anonymous users back to the profile', async () => {
        const { server } = await createTestServer();
        const profileApi = server.createApiClient(ProfileApiPrototype);

        const result: unknown = await RequestContext.run(() => profileApi.profile());

        expect(result).toBeInstanceOf(ChallengeResult);
        expect(result).toMatchObject({ properties: { redirectUri: '/profile' } });
    });
});

describe('Fetch data page', () => {
    it('should call the forecast API with the access token as bearer token', async () => {
        const { server, oidc, forecastClients } = await createTestServer([
            { date: { value: '2026-03-11' }, temperatureC: 17, temperatureF: 62, summary: 'Warm' },
        ]);
        oidc.signIn(JANE, 'test-access-token');
        const fetchDataApi = server.createApiClient(FetchDataApiPrototype);

        const result = await RequestContext.run(() => fetchDataApi.fetchData());

        expect(result.html).toContain('<tr><td>2026-03-11</td><td>17</td><td>62</td><td>Warm</td></tr>');
        expect(forecastClients.sentHeaders).toHaveLength(1);
        const sent = forecastClients.sentHeaders[0];
        expect(sent.get('authorization')).toBe('Bearer test-access-token');
        expect(sent.get('x-request-id')).toMatch(/^svrGenReqId-/);
    });

    it('should use each request\'s own token', async () => {
        const { server, oidc, forecastClients } = await createTestServer();
        const fetchDataApi = server.createApiClient(FetchDataApiPrototype);

        oidc.signIn(JANE, 'test-token-one');
        await RequestContext.run(() => fetchDataApi.fetchData());
        oidc.signIn(JANE, 'test-token-two');
        await RequestContext.run(() => fetchDataApi.fetchData());

        expect(forecastClients.sentHeaders.map((headers) => headers.get('authorization'))).toEqual([
            'Bearer test-token-one',
            'Bearer test-token-two',
        ]);
    });

    it('should not call the API when the session has no access token', async () => {
        const { server, oidc, forecastClients } = await createTestServer();
        oidc.signInWithoutAccessToken(JANE);
        const fetchDataApi = server.createApiClient(FetchDataApiPrototype);

        const result = await RequestContext.run(() => fetchDataApi.fetchData());

        expect(result.status).toBe(200);
        expect(result.html).toContain('<p class="notice">No access token in this session.');
        expect(result.html).not.toContain('<table');
        expect(forecastClients.sentHeaders).toEqual([]);
    });

    it('should show API errors on the page', async () => {
        const { server, oidc, forecastClients } = await createTestServer();
        forecastClients.failWith = new HttpUnauthorizedError('Bearer token required for /api/forecasts', MISSING_BEARER_TOKEN);
        oidc.signIn(JANE, 'test-access-token');
        const fetchDataApi = server.createApiClient(FetchDataApiPrototype);

        const result = await RequestContext.run(() => fetchDataApi.fetchData());

        expect(result.status).toBe(200);
        expect(result.html).toContain(
            '<p class="error">Could not load forecasts: Bearer token required for /api/forecasts</p>',
        );
    });

    it('should escape API error messages', async () => {
        const { server, oidc, forecastClients } = await createTestServer();
        forecastClients.failWith = new HttpBadGatewayError('<upstream> down');
        oidc.signIn(JANE, 'test-access-token');
        const fetchDataApi = server.createApiClient(FetchDataApiPrototype);

        const result = await RequestContext.run(() => fetchDataApi.fetchData());

        expect(result.html).toContain('<p class="error">Could not load forecasts: &lt;upstream&gt; down</p>');
    });
});

describe('WeatherForecastService', () => {
    it('should never forward the browser\'s authorization header', async () => {
        const forecastClients = new RecordingForecastClientFactory();
        const service = new WeatherForecastService(forecastClients);

        await RequestContext.run(() => {
            RequestContext.putHeader(CoreHeaders.REQUEST_ID, 'req-7');
            RequestContext.putHeader(AuthHeaders.AUTHORIZATION, 'Bearer test-browser-token');
            return service.getForecasts(new TokenProvider());
        });

        expect(forecastClients.sentHeaders).toEqual([new Map([['x-request-id', 'req-7']])]);
    });
});

describe('safeImageUrl', () => {
    it('should keep http and https URLs', () => {
        expect(safeImageUrl('https://img.example.test/a.png')).toBe('https://img.example.test/a.png');
        expect(safeImageUrl('http://img.example.test/a.png')).toBe('http://img.example.test/a.png');
    });

    it('should drop other schemes and unparseable values', () => {
        expect(safeImageUrl('javascript:alert(1)')).toBe('');
        expect(safeImageUrl('data:image/svg+xml;base64,PHN2Zy8+')).toBe('');
        expect(safeImageUrl('/relative.png')).toBe('');
        expect(safeImageUrl('')).toBe('');
    });
});
