/**
 * Options for a challenge or sign-out: where to send the user afterwards,
 * plus extra parameters for the identity provider.
 */
export class AuthenticationProperties {
    constructor(
        public readonly redirectUri?: string,
        public readonly parameters: ReadonlyMap<string, string> = new Map(),
    ) {}
}

/**
 * ```typescript
 * const props = new LoginAuthenticationPropertiesBuilder()
 *     .withRedirectUri('/profile')
 *     .withParameter('screen_hint', 'signup')
 *     .build();
 * ```
 */
export class LoginAuthenticationPropertiesBuilder {
    private redirectUri?: string;
    private parameters = new Map<string, string>();

    withRedirectUri(redirectUri: string): this {
        this.redirectUri = redirectUri;
        return this;
    }

    /**
     * Sent to the authorization endpoint as a query parameter.
     */
    withParameter(name: string, value: string): this {
        this.parameters.set(name, value);
        return this;
    }

    build(): AuthenticationProperties {
        return new AuthenticationProperties(this.redirectUri, new Map(this.parameters));
    }
}

export class LogoutAuthenticationPropertiesBuilder {
    private redirectUri?: string;

    withRedirectUri(redirectUri: string): this {
        this.redirectUri = redirectUri;
        return this;
    }

    build(): AuthenticationProperties {
        return new AuthenticationProperties(this.redirectUri);
    }
}
