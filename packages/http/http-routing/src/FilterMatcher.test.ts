import { Filter, RouteResult, Service } from '@oidc-quickstart/http-filters';
import { FilterMatcher, FilterWithMeta } from './FilterMatcher';
import { FilterDefinition } from './WebAppMeta';
import { MethodMeta } from './MethodMeta';

class PassThroughFilter extends Filter<MethodMeta, RouteResult<unknown>> {
    constructor(public label: string) {
        super();
    }

    filter(meta: MethodMeta, nextFilter: Service<MethodMeta, RouteResult<unknown>>): Promise<RouteResult<unknown>> {
        return nextFilter.invoke(meta);
    }
}

function entry(label: string, priority: number, pattern: string): FilterWithMeta {
    return new FilterWithMeta(
        new PassThroughFilter(label),
        new FilterDefinition(priority, PassThroughFilter, pattern),
    );
}

function labels(filters: Filter<MethodMeta, RouteResult<unknown>>[]): string[] {
    return filters.map((f) => (f instanceof PassThroughFilter ? f.label : 'other'));
}

describe('FilterMatcher', () => {
    const context = entry('context', 2000, '*');
    const log = entry('log', 1800, '*');
    const requireAuth = entry('requireAuth', 1500, 'src/controllers/secure/**/*.ts');
    const bearer = entry('bearer', 1500, 'src/controllers/api/**/*.ts');
    const registry = [requireAuth, log, bearer, context];

    it('should apply secure filters only to secure controllers', () => {
        const result = FilterMatcher.findMatchingFilters('src/controllers/secure/ProfileController.ts', registry);

        expect(labels(result)).toEqual(['context', 'log', 'requireAuth']);
    });

    it('should apply bearer filter only to API controllers', () => {
        const result = FilterMatcher.findMatchingFilters('src/controllers/api/ForecastController.ts', registry);

        expect(labels(result)).toEqual(['context', 'log', 'bearer']);
    });

    it('should give public controllers the global filters only', () => {
        const result = FilterMatcher.findMatchingFilters('src/controllers/LoginController.ts', registry);

        expect(labels(result)).toEqual(['context', 'log']);
    });

    it('should match a single file pattern anywhere in the tree', () => {
        const logoutOnly = entry('logoutOnly', 100, '**/LogoutController.ts');

        expect(labels(FilterMatcher.findMatchingFilters('src/controllers/secure/LogoutController.ts', [logoutOnly]))).toEqual([
            'logoutOnly',
        ]);
        expect(FilterMatcher.findMatchingFilters('src/controllers/LoginController.ts', [logoutOnly])).toEqual([]);
    });

    it('should match only global patterns when the filepath is unknown', () => {
        const everything = entry('everything', 10, '**/*');

        const result = FilterMatcher.findMatchingFilters(undefined, [...registry, everything]);

        expect(labels(result)).toEqual(['context', 'log', 'everything']);
    });

    it('should normalize windows paths and leading ./', () => {
        expect(FilterMatcher.normalizeFilepath('.\\src\\controllers\\secure\\ProfileController.ts')).toBe(
            'src/controllers/secure/ProfileController.ts',
        );
        expect(FilterMatcher.normalizeFilepath('./src/a.ts')).toBe('src/a.ts');
        expect(FilterMatcher.normalizeFilepath('src/a.ts')).toBe('src/a.ts');
    });
});
