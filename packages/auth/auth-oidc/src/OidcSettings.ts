import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';

/**
 * The `auth` section of the settings file.
 */
export class OidcSettings {
    /**
     * Identity provider domain, e.g. 'tenant.example-idp.test'. A value
     * starting with http:// or https:// is used as the issuer URL as is.
     */
    @IsString()
    @IsNotEmpty()
    domain: string = '';

    @IsString()
    @IsNotEmpty()
    clientId: string = '';

    /**
     * Enables the authorization-code flow. Without it the SDK falls back to
     * the implicit id_token flow and no access or refresh token is issued.
     */
    @IsString()
    @IsOptional()
    clientSecret?: string;

    @IsString()
    @IsNotEmpty()
    scope: string = 'openid profile email';

    /**
     * API identifier the access token is requested for.
     */
    @IsString()
    @IsOptional()
    audience?: string;

    /**
     * Adds offline_access to the scope.
     */
    @IsBoolean()
    useRefreshTokens: boolean = false;

    @IsString()
    @Matches(/^\/[^/]/, { message: 'callbackPath must be a local path like /callback' })
    callbackPath: string = '/callback';
}
