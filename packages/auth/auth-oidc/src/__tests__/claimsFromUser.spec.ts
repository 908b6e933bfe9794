import { claimsFromUser } from '../claimsFromUser';

describe('claimsFromUser', () => {
    it('should turn each user property into a claim', () => {
        const claims = claimsFromUser({
            sub: 'idp|123',
            email: 'jane@example.test',
            email_verified: true,
            updated_at: 1700000000,
            address: { country: 'NZ' },
            middle_name: null,
            website: undefined,
        });

        expect(claims.map((claim) => [claim.type, claim.value])).toEqual([
            ['sub', 'idp|123'],
            ['email', 'jane@example.test'],
            ['email_verified', 'true'],
            ['updated_at', '1700000000'],
            ['address', '{"country":"NZ"}'],
        ]);
    });

    it('should yield no claims for an empty user', () => {
        expect(claimsFromUser({})).toEqual([]);
    });
});
