import { Container, inject, injectable, Newable } from 'inversify';
import { TokenProvider } from '@oidc-quickstart/auth-api';
import { HtmlResult } from '@oidc-quickstart/http-api';
import { provideSingleton } from '@oidc-quickstart/http-routing';
import { SERVER_TYPES } from '@oidc-quickstart/http-server';
import { AppComponent } from './AppComponent';
import { PageComponent } from './Component';
import { HostPage } from './HostPage';
import { LoginDisplay } from './LoginDisplay';
import { MainLayout } from './MainLayout';
import { NavMenu } from './NavMenu';

/**
 * Renders a page inside a fresh render scope: a child container holding its
 * own TokenProvider and component instances, with the application's
 * services inherited from the parent.
 *
 * ```typescript
 * return this.renderer.renderPage(ProfilePage, (page) => {
 *     page.profile = profile;
 * });
 * ```
 */
@provideSingleton()
@injectable()
export class ComponentRenderer {
    constructor(@inject(SERVER_TYPES.AppContainer) private appContainer: Container) {}

    async renderPage<T extends PageComponent>(pageClass: Newable<T>, configure?: (page: T) => void): Promise<HtmlResult> {
        const scope = this.createRenderScope();
        scope.bind(pageClass).toSelf().inSingletonScope();

        const app = scope.get(AppComponent);
        app.initialize(HostPage.readInitialState());

        const page = scope.get(pageClass);
        configure?.(page);

        const appHtml = await app.render(page);
        return new HtmlResult(HostPage.render(page.title, appHtml));
    }

    private createRenderScope(): Container {
        const scope = new Container({ parent: this.appContainer });
        scope.bind(TokenProvider).toSelf().inSingletonScope();
        scope.bind(AppComponent).toSelf().inSingletonScope();
        scope.bind(MainLayout).toSelf().inSingletonScope();
        scope.bind(NavMenu).toSelf().inSingletonScope();
        scope.bind(LoginDisplay).toSelf().inSingletonScope();
        return scope;
    }
}
