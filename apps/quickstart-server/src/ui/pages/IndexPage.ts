import { injectable } from 'inversify';
import { AuthContext } from '@oidc-quickstart/auth-api';
import { PageComponent } from '../Component';

@injectable()
export class IndexPage extends PageComponent {
    readonly title = 'Home';

    async render(): Promise<string> {
        const signedIn = AuthContext.getPrincipal().isAuthenticated;
        return [
            '<h1>Hello, world!</h1>',
            '<p>Welcome to the OIDC quickstart.</p>',
            signedIn
                ? '<p>You are signed in. Open <a href="/profile">Profile</a> to see your claims.</p>'
                : '<p>Log in to see your profile and the protected forecast data.</p>',
        ].join('\n');
    }
}
