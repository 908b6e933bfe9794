import { ChallengeResult, SignOutResult } from '@oidc-quickstart/auth-api';
import { ApiInterface, Get, Path } from '@oidc-quickstart/http-routing';

/**
 * Query string of GET /account/login.
 */
export interface LoginRequest {
    /**
     * Local path to return to after login. Defaults to '/'.
     */
    redirectUri?: string;
}

export interface LoginApi {
    login(request: LoginRequest): Promise<ChallengeResult>;
}

@ApiInterface()
export abstract class LoginApiPrototype implements LoginApi {
    @Get()
    @Path('/account/login')
    login(request: LoginRequest): Promise<ChallengeResult> {
        throw new Error('Method login() must be implemented by subclass');
    }
}

export interface LogoutApi {
    logout(): Promise<SignOutResult>;
}

@ApiInterface()
export abstract class LogoutApiPrototype implements LogoutApi {
    @Get()
    @Path('/account/logout')
    logout(): Promise<SignOutResult> {
        throw new Error('Method logout() must be implemented by subclass');
    }
}
