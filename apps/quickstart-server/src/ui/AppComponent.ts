import { inject, injectable } from 'inversify';
import { InitialApplicationState, TokenProvider } from '@oidc-quickstart/auth-api';
import { PageComponent } from './Component';
import { MainLayout } from './MainLayout';

/**
 * Root of every render. Seeds the scope's TokenProvider from the initial
 * state before any page renders, so pages see the user's tokens.
 */
@injectable()
export class AppComponent {
    constructor(
        @inject(TokenProvider) private tokenProvider: TokenProvider,
        @inject(MainLayout) private layout: MainLayout,
    ) {}

    initialize(state: InitialApplicationState): void {
        this.tokenProvider.seed(state);
    }

    async render(page: PageComponent): Promise<string> {
        return this.layout.render(await page.render());
    }
}
