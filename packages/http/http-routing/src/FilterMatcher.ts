import { minimatch } from 'minimatch';
import { FilterDefinition, HttpFilter } from './WebAppMeta';

/**
 * A DI-resolved filter paired with the definition it was registered from.
 */
export class FilterWithMeta {
    constructor(
        public filter: HttpFilter,
        public definition: FilterDefinition,
    ) {}
}

/**
 * Picks the filters that apply to a controller by globbing its source path.
 */
export class FilterMatcher {
    /**
     * @returns matching filters, highest priority first
     */
    static findMatchingFilters(
        controllerFilepath: string | undefined,
        allFilters: FilterWithMeta[],
    ): HttpFilter[] {
        const matching: FilterWithMeta[] = [];

        for (const entry of allFilters) {
            const pattern = entry.definition.filepathPattern;

            if (pattern === '*') {
                matching.push(entry);
                continue;
            }

            if (!controllerFilepath) {
                if (pattern === '**/*') {
                    matching.push(entry);
                }
                continue;
            }

            if (minimatch(FilterMatcher.normalizeFilepath(controllerFilepath), pattern)) {
                matching.push(entry);
            }
        }

        matching.sort((a, b) => b.definition.priority - a.definition.priority);
        return matching.map((entry) => entry.filter);
    }

    /**
     * Forward slashes only, no leading './'.
     */
    static normalizeFilepath(filepath: string): string {
        return filepath.replace(/\\/g, '/').replace(/^\.\//, '');
    }
}
