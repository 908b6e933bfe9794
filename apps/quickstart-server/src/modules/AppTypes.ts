/**
 * DI tokens of the application module.
 */
export const APP_TYPES = {
    AppSettings: Symbol.for('AppSettings'),
    ForecastClientFactory: Symbol.for('ForecastClientFactory'),
    Clock: Symbol.for('Clock'),
    Random: Symbol.for('Random'),
};

/**
 * Current time; rebound in tests.
 */
export type Clock = () => Date;

/**
 * Uniform number in [0, 1), like Math.random.
 */
export type RandomSource = () => number;
