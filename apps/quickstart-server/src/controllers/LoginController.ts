import {
    AuthSchemes,
    ChallengeResult,
    LoginAuthenticationPropertiesBuilder,
} from '@oidc-quickstart/auth-api';
import { Controller, provideSingleton, SourceFile, ValidateImplementation } from '@oidc-quickstart/http-routing';
import { LoginApi, LoginApiPrototype, LoginRequest } from '../api/AccountApi';

/**
 * Only paths on this site are accepted as return targets, so the login
 * link cannot be used to bounce users to another origin.
 */
export function isLocalPath(uri: string | undefined): uri is string {
    return uri !== undefined && uri.startsWith('/') && !uri.startsWith('//') && !uri.startsWith('/\\');
}

@SourceFile('src/controllers/LoginController.ts')
@provideSingleton()
@Controller()
export class LoginController extends LoginApiPrototype implements LoginApi {
    private readonly __validator!: ValidateImplementation<LoginController, LoginApi>;

    override async login(request: LoginRequest): Promise<ChallengeResult> {
        const redirectUri = isLocalPath(request.redirectUri) ? request.redirectUri : '/';
        if (request.redirectUri !== undefined && redirectUri !== request.redirectUri) {
            console.warn(`[LoginController] Ignoring non-local redirectUri=${request.redirectUri}`);
        }

        const properties = new LoginAuthenticationPropertiesBuilder().withRedirectUri(redirectUri).build();
        return new ChallengeResult(AuthSchemes.OIDC, properties);
    }
}
