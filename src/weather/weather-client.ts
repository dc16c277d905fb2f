/**
 * OpenWeatherMap forecast client
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import { AlertError, AlertErrorType } from '../system/error-handling';
import { Logger, createLogger } from '../system/logger';
import { parseForecast } from './forecast-parser';
import { ForecastResponse } from './types';

export interface WeatherClientConfig {
  apiKey: string;
  baseUrl: string;
  /** Request timeout (ms) */
  timeout: number;
}

export const DEFAULT_WEATHER_BASE_URL = 'https://api.openweathermap.org/data/2.5';

/**
 * Anything that can produce a forecast for a location.
 */
export interface ForecastProvider {
  fetchForecast(location: string): Promise<ForecastResponse>;
}

export class WeatherClient implements ForecastProvider {
  private readonly config: WeatherClientConfig;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: Partial<WeatherClientConfig> & Pick<WeatherClientConfig, 'apiKey'>, logger?: Logger) {
    this.config = {
      baseUrl: DEFAULT_WEATHER_BASE_URL,
      timeout: 10000,
      ...config
    };
    this.logger = logger ?? createLogger('weather-client');
    this.http = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout
    });
  }

  async fetchForecast(location: string): Promise<ForecastResponse> {
    this.logger.info(`Fetching weather forecast for ${location}`, undefined, 'fetchForecast');

    let body: unknown;
    try {
      const response = await this.http.get<unknown>('/forecast', {
        params: {
          q: location,
          appid: this.config.apiKey,
          units: 'metric'
        }
      });
      body = response.data;
    } catch (error) {
      throw this.toAlertError(error, location);
    }

    const parsed = parseForecast(body);
    if (!parsed) {
      throw new AlertError('Invalid forecast data: response has no forecast list', AlertErrorType.DATA_PARSING_ERROR, {
        operation: 'fetchForecast',
        details: { location }
      });
    }

    if (parsed.skipped > 0) {
      this.logger.warn(`Skipped ${parsed.skipped} malformed forecast entries`, { location }, 'fetchForecast');
    }

    return parsed.forecast;
  }

  private toAlertError(error: unknown, location: string): AlertError {
    const operation = 'fetchForecast';

    if (!isAxiosError(error)) {
      return new AlertError(
        `Error fetching weather data: ${error instanceof Error ? error.message : String(error)}`,
        AlertErrorType.UNKNOWN_ERROR,
        { operation, cause: error, details: { location } }
      );
    }

    const status = error.response?.status;
    if (status === undefined) {
      return new AlertError(`Network error fetching weather data: ${error.message}`, AlertErrorType.NETWORK_ERROR, {
        operation,
        cause: error,
        details: { location, code: error.code }
      });
    }

    const details = { location, status };
    if (status === 401) {
      return new AlertError('OpenWeatherMap rejected the API key (401)', AlertErrorType.CONFIGURATION_ERROR, {
        operation,
        cause: error,
        details
      });
    }
    if (status === 404) {
      return new AlertError(`Location not found: ${location}`, AlertErrorType.CONFIGURATION_ERROR, {
        operation,
        cause: error,
        details
      });
    }
    if (status === 429) {
      return new AlertError('OpenWeatherMap rate limit exceeded (429)', AlertErrorType.API_ERROR, {
        operation,
        cause: error,
        retryable: true,
        details
      });
    }
    if (status >= 500) {
      return new AlertError(`OpenWeatherMap server error (${status})`, AlertErrorType.SERVER_ERROR, {
        operation,
        cause: error,
        details
      });
    }
    return new AlertError(`OpenWeatherMap request failed (${status})`, AlertErrorType.API_ERROR, {
      operation,
      cause: error,
      details
    });
  }
}
