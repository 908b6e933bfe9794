import { MethodMeta } from './MethodMeta';

/**
 * Invokes one controller method. A class rather than a bare function so it
 * shows up by name in stack traces.
 */
export abstract class RouteHandler<TResult = unknown> {
    abstract execute(meta: MethodMeta): Promise<TResult>;
}
