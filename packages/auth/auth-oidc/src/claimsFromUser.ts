import { Claim } from '@oidc-quickstart/auth-api';

/**
 * One claim per property of the SDK's user object.
 * Non-string values are stringified; null and undefined are dropped.
 */
export function claimsFromUser(user: Record<string, unknown>): Claim[] {
    const claims: Claim[] = [];
    for (const [type, value] of Object.entries(user)) {
        if (value === null || value === undefined) {
            continue;
        }
        claims.push(new Claim(type, stringifyClaimValue(value)));
    }
    return claims;
}

function stringifyClaimValue(value: unknown): string {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'object') {
        return JSON.stringify(value);
    }
    return String(value);
}
