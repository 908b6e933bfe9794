import { AuthContext, InitialApplicationState } from '@oidc-quickstart/auth-api';
import { escapeHtml } from './escapeHtml';

/**
 * The HTML document around the rendered app.
 */
export class HostPage {
    /**
     * Tokens of the current request, taken from the HTTP context. They seed
     * the render only and are never written into the page.
     */
    static readInitialState(): InitialApplicationState {
        const tokens = AuthContext.getTokens();
        return {
            idToken: tokens.idToken,
            accessToken: tokens.accessToken,
            refreshToken: tokens.refreshToken,
        };
    }

    static render(title: string, appHtml: string): string {
        return [
            '<!DOCTYPE html>',
            '<html lang="en">',
            '<head>',
            '<meta charset="utf-8" />',
            '<meta name="viewport" content="width=device-width, initial-scale=1.0" />',
            `<title>${escapeHtml(title)}</title>`,
            '</head>',
            '<body>',
            '<div id="app">',
            appHtml,
            '</div>',
            '</body>',
            '</html>',
        ].join('\n');
    }
}
