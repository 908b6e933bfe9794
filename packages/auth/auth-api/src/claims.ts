/**
 * Claim types read by the application. Values follow the OIDC standard
 * claim names, so they match the keys of the ID token payload.
 */
export const ClaimTypes = {
    SUBJECT: 'sub',
    NAME: 'name',
    NICKNAME: 'nickname',
    EMAIL: 'email',
    PICTURE: 'picture',
} as const;

export class Claim {
    constructor(
        public readonly type: string,
        public readonly value: string,
    ) {}
}

/**
 * The user behind the current request, as a list of claims.
 *
 * ```typescript
 * const principal = AuthContext.getPrincipal();
 * if (principal.isAuthenticated) {
 *     const email = principal.findFirstValue(ClaimTypes.EMAIL) ?? '';
 * }
 * ```
 */
export class ClaimsPrincipal {
    private static readonly ANONYMOUS = new ClaimsPrincipal([], false);

    constructor(
        public readonly claims: readonly Claim[],
        public readonly isAuthenticated: boolean,
    ) {}

    static anonymous(): ClaimsPrincipal {
        return ClaimsPrincipal.ANONYMOUS;
    }

    /**
     * Display name: the `name` claim, else `nickname`.
     */
    get name(): string | undefined {
        return this.findFirstValue(ClaimTypes.NAME) ?? this.findFirstValue(ClaimTypes.NICKNAME);
    }

    findFirstValue(type: string): string | undefined {
        return this.claims.find((claim) => claim.type === type)?.value;
    }
}
