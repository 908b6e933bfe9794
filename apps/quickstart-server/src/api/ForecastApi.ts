import { DateDto } from '@oidc-quickstart/http-api';
import { ApiInterface, Path, Post } from '@oidc-quickstart/http-routing';

// All fields optional for protocol evolution

export interface WeatherForecast {
    date?: DateDto;
    temperatureC?: number;
    temperatureF?: number;
    summary?: string;
}

export interface ForecastRequest {}

export interface ForecastResponse {
    forecasts?: WeatherForecast[];
}

/**
 * Sample protected API, called with the user's access token as a bearer token.
 */
export interface ForecastApi {
    getForecasts(request: ForecastRequest): Promise<ForecastResponse>;
}

@ApiInterface()
export abstract class ForecastApiPrototype implements ForecastApi {
    @Post()
    @Path('/api/forecasts')
    getForecasts(request: ForecastRequest): Promise<ForecastResponse> {
        throw new Error('Method getForecasts() must be implemented by subclass');
    }
}
