import { inject, injectable } from 'inversify';
import { LoginDisplay } from './LoginDisplay';
import { NavMenu } from './NavMenu';

@injectable()
export class MainLayout {
    constructor(
        @inject(NavMenu) private navMenu: NavMenu,
        @inject(LoginDisplay) private loginDisplay: LoginDisplay,
    ) {}

    render(body: string): string {
        return [
            '<div class="page">',
            '<div class="sidebar">',
            this.navMenu.render(),
            '</div>',
            '<main>',
            '<div class="top-row">',
            this.loginDisplay.render(),
            '</div>',
            '<article class="content">',
            body,
            '</article>',
            '</main>',
            '</div>',
        ].join('\n');
    }
}
