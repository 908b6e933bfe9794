import { inject } from 'inversify';
import { DateUtil } from '@oidc-quickstart/http-api';
import { Controller, provideSingleton, SourceFile, ValidateImplementation } from '@oidc-quickstart/http-routing';
import { ForecastApi, ForecastApiPrototype, ForecastRequest, ForecastResponse, WeatherForecast } from '../../api/ForecastApi';
import { APP_TYPES, Clock, RandomSource } from '../../modules/AppTypes';

const SUMMARIES = ['Freezing', 'Bracing', 'Chilly', 'Cool', 'Mild', 'Warm', 'Balmy', 'Hot', 'Sweltering', 'Scorching'];

const FORECAST_DAYS = 5;

export function toFahrenheit(temperatureC: number): number {
    return 32 + Math.trunc(temperatureC / 0.5556);
}

/**
 * Five days of made-up weather, starting tomorrow.
 * Reached only with a bearer token (BearerTokenFilter).
 */
@SourceFile('src/controllers/api/ForecastController.ts')
@provideSingleton()
@Controller()
export class ForecastController extends ForecastApiPrototype implements ForecastApi {
    private readonly __validator!: ValidateImplementation<ForecastController, ForecastApi>;

    constructor(
        @inject(APP_TYPES.Clock) private clock: Clock,
        @inject(APP_TYPES.Random) private random: RandomSource,
    ) {
        super();
    }

    override async getForecasts(request: ForecastRequest): Promise<ForecastResponse> {
        const today = DateUtil.fromDate(this.clock());
        const forecasts: WeatherForecast[] = [];

        for (let day = 1; day <= FORECAST_DAYS; day++) {
            // temperature in [-20, 55)
            const temperatureC = -20 + Math.floor(this.random() * 75);
            forecasts.push({
                date: DateUtil.plusDays(today, day),
                temperatureC,
                temperatureF: toFahrenheit(temperatureC),
                summary: SUMMARIES[Math.floor(this.random() * SUMMARIES.length)],
            });
        }

        return { forecasts };
    }
}
