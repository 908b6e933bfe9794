import { injectable } from 'inversify';

/**
 * Tokens handed from the HTTP context to the first render.
 */
export interface InitialApplicationState {
    idToken?: string;
    accessToken?: string;
    refreshToken?: string;
}

/**
 * Token holder injected into components. One instance per render scope,
 * seeded by the root component from the InitialApplicationState.
 */
@injectable()
export class TokenProvider {
    idToken?: string;
    accessToken?: string;
    refreshToken?: string;

    seed(state: InitialApplicationState): void {
        this.idToken = state.idToken;
        this.accessToken = state.accessToken;
        this.refreshToken = state.refreshToken;
    }
}
