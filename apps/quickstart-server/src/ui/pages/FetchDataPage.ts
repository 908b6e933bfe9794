import { inject, injectable } from 'inversify';
import { TokenProvider } from '@oidc-quickstart/auth-api';
import { HttpError } from '@oidc-quickstart/http-api';
import { WeatherForecast } from '../../api/ForecastApi';
import { WeatherForecastService } from '../../services/WeatherForecastService';
import { PageComponent } from '../Component';
import { escapeHtml } from '../escapeHtml';

/**
 * Forecasts from the protected API, fetched with the access token of the
 * render scope's TokenProvider.
 *
 * Without an access token (the id_token flow issues none) the API is not
 * called. API errors are shown on the page.
 */
@injectable()
export class FetchDataPage extends PageComponent {
    readonly title = 'Weather forecast';

    constructor(
        @inject(TokenProvider) private tokenProvider: TokenProvider,
        @inject(WeatherForecastService) private forecastService: WeatherForecastService,
    ) {
        super();
    }

    async render(): Promise<string> {
        const header = [
            '<h1>Weather forecast</h1>',
            '<p>This component demonstrates fetching data from a protected API.</p>',
        ];

        if (!this.tokenProvider.accessToken) {
            return [
                ...header,
                '<p class="notice">No access token in this session. Configure a client secret and an audience to call the API.</p>',
            ].join('\n');
        }

        let forecasts: WeatherForecast[];
        try {
            forecasts = await this.forecastService.getForecasts(this.tokenProvider);
        } catch (err: unknown) {
            if (!(err instanceof HttpError)) {
                throw err;
            }
            console.warn(`[FetchDataPage] Forecast API failed with ${err.code}: ${err.message}`);
            return [...header, `<p class="error">Could not load forecasts: ${escapeHtml(err.message)}</p>`].join('\n');
        }

        return [
            ...header,
            '<table class="table">',
            '<thead>',
            '<tr><th>Date</th><th>Temp. (C)</th><th>Temp. (F)</th><th>Summary</th></tr>',
            '</thead>',
            '<tbody>',
            ...forecasts.map((forecast) => this.renderRow(forecast)),
            '</tbody>',
            '</table>',
        ].join('\n');
    }

    private renderRow(forecast: WeatherForecast): string {
        const cells = [
            forecast.date?.value ?? '',
            String(forecast.temperatureC ?? ''),
            String(forecast.temperatureF ?? ''),
            forecast.summary ?? '',
        ];
        return `<tr>${cells.map((cell) => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`;
    }
}
