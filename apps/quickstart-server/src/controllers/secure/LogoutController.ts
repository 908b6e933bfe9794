import {
    AuthSchemes,
    LogoutAuthenticationPropertiesBuilder,
    SignOutResult,
} from '@oidc-quickstart/auth-api';
import { Controller, provideSingleton, SourceFile, ValidateImplementation } from '@oidc-quickstart/http-routing';
import { LogoutApi, LogoutApiPrototype } from '../../api/AccountApi';

/**
 * Signs out of the identity provider and the local session cookie, then
 * lands on the home page.
 */
@SourceFile('src/controllers/secure/LogoutController.ts')
@provideSingleton()
@Controller()
export class LogoutController extends LogoutApiPrototype implements LogoutApi {
    private readonly __validator!: ValidateImplementation<LogoutController, LogoutApi>;

    override async logout(): Promise<SignOutResult> {
        const properties = new LogoutAuthenticationPropertiesBuilder().withRedirectUri('/').build();
        return new SignOutResult([AuthSchemes.OIDC, AuthSchemes.COOKIE], properties);
    }
}
