import { inject, injectable } from 'inversify';
import { AuthSchemes, ChallengeResult, SignOutResult } from '@oidc-quickstart/auth-api';
import { HttpInternalServerError } from '@oidc-quickstart/http-api';
import { RouterReqResp } from '@oidc-quickstart/http-routing';
import { ResultWriter } from '@oidc-quickstart/http-server';
import { OidcAccessor, OidcResponseView } from './OidcAccessor';
import { AuthorizationParameters } from './OidcConfig';
import { OIDC_TYPES } from './OidcTypes';

/**
 * Carries out ChallengeResult and SignOutResult through the SDK.
 *
 * The SDK signs the user out of the identity provider and the local session
 * cookie in one step, so a sign-out must name exactly those two schemes.
 */
@injectable()
export class OidcResultWriter implements ResultWriter {
    constructor(@inject(OIDC_TYPES.OidcAccessor) private accessor: OidcAccessor) {}

    async tryWrite(result: unknown, reqResp: RouterReqResp): Promise<boolean> {
        if (result instanceof ChallengeResult) {
            await this.challenge(result, reqResp);
            return true;
        }
        if (result instanceof SignOutResult) {
            await this.signOut(result, reqResp);
            return true;
        }
        return false;
    }

    private async challenge(result: ChallengeResult, reqResp: RouterReqResp): Promise<void> {
        if (result.scheme !== AuthSchemes.OIDC) {
            throw new HttpInternalServerError(`No challenge handler for authentication scheme '${result.scheme}'`);
        }
        const oidc = this.requireResponse(reqResp);

        const returnTo = result.properties.redirectUri ?? '/';
        if (result.properties.parameters.size === 0) {
            await oidc.login({ returnTo });
            return;
        }

        const authorizationParams: AuthorizationParameters = {};
        for (const [name, value] of result.properties.parameters) {
            authorizationParams[name] = value;
        }
        await oidc.login({ returnTo, authorizationParams });
    }

    private async signOut(result: SignOutResult, reqResp: RouterReqResp): Promise<void> {
        const schemes = new Set(result.schemes);
        const expected = [AuthSchemes.OIDC, AuthSchemes.COOKIE];
        if (schemes.size !== expected.length || !expected.every((scheme) => schemes.has(scheme))) {
            throw new HttpInternalServerError(
                `Sign-out must name schemes ${expected.join(' and ')} together, got [${result.schemes.join(', ')}]`,
            );
        }

        const oidc = this.requireResponse(reqResp);
        await oidc.logout({ returnTo: result.properties.redirectUri ?? '/' });
    }

    private requireResponse(reqResp: RouterReqResp): OidcResponseView {
        const oidc = this.accessor.response(reqResp);
        if (!oidc) {
            throw new HttpInternalServerError('OIDC middleware is not mounted for this request');
        }
        return oidc;
    }
}
