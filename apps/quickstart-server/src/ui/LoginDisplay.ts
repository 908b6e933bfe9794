import { injectable } from 'inversify';
import { AuthContext } from '@oidc-quickstart/auth-api';
import { RequestContext } from '@oidc-quickstart/core-context';
import { ServerContextKeys } from '@oidc-quickstart/http-server';
import { escapeHtml } from './escapeHtml';

/**
 * Greeting and logout link for a signed-in user, login link otherwise.
 * The login link returns to the page it was clicked on.
 */
@injectable()
export class LoginDisplay {
    render(): string {
        const principal = AuthContext.getPrincipal();
        if (principal.isAuthenticated) {
            return [
                `<span>Hello, ${escapeHtml(principal.name ?? '')}!</span>`,
                '<a href="/account/logout">Log out</a>',
            ].join('\n');
        }

        const currentUrl = RequestContext.get(ServerContextKeys.REQUEST_URL) ?? '/';
        const loginHref = `/account/login?redirectUri=${encodeURIComponent(currentUrl)}`;
        return `<a href="${escapeHtml(loginHref)}">Log in</a>`;
    }
}
