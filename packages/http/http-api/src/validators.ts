/**
 * Compile-time check that a class implements every method of an API interface
 * with a matching signature.
 *
 * ```typescript
 * export class ForecastController extends ForecastApiPrototype implements ForecastApi {
 *   private readonly __validator!: ValidateImplementation<ForecastController, ForecastApi>;
 * }
 * ```
 *
 * The field is never read at runtime.
 */
export type ValidateImplementation<TImpl, TInterface> = {
    [K in keyof TInterface]: K extends keyof TImpl
        ? TImpl[K] extends TInterface[K]
            ? TInterface[K]
            : never
        : never;
};
