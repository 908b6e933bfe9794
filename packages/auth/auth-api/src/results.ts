import { ActionResult } from '@oidc-quickstart/http-api';
import { AuthenticationProperties } from './AuthenticationProperties';

/**
 * Asks the scheme's handler to start a login, e.g. a redirect to the
 * identity provider.
 */
export class ChallengeResult extends ActionResult {
    constructor(
        public readonly scheme: string,
        public readonly properties: AuthenticationProperties,
    ) {
        super();
    }

    describe(): string {
        return `ChallengeResult(${this.scheme}, redirectUri=${this.properties.redirectUri ?? ''})`;
    }
}

/**
 * Signs the user out of every listed scheme.
 */
export class SignOutResult extends ActionResult {
    constructor(
        public readonly schemes: readonly string[],
        public readonly properties: AuthenticationProperties,
    ) {
        super();
    }

    describe(): string {
        return `SignOutResult(${this.schemes.join(',')}, redirectUri=${this.properties.redirectUri ?? ''})`;
    }
}
