/**
 * Weather Service
 *
 * Fetches the forecast for the configured location, retrying transient
 * failures, and analyzes it for alert conditions.
 */

import {
  DEFAULT_RETRY_OPTIONS,
  RetryOptions,
  WeatherFetchErrorHandler
} from '../system/error-handling';
import { Logger, createLogger } from '../system/logger';
import { ConditionAnalyzer } from './condition-analyzer';
import { ForecastProvider } from './weather-client';
import { ForecastResponse, WeatherCondition } from './types';

export interface WeatherServiceOptions {
  location: string;
  retry?: RetryOptions;
  analyzer?: ConditionAnalyzer;
  logger?: Logger;
}

export class WeatherService {
  private readonly provider: ForecastProvider;
  private readonly location: string;
  private readonly retry: RetryOptions;
  private readonly analyzer: ConditionAnalyzer;
  private readonly logger: Logger;
  private readonly errorHandler: WeatherFetchErrorHandler;

  constructor(provider: ForecastProvider, options: WeatherServiceOptions) {
    this.provider = provider;
    this.location = options.location;
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.logger = options.logger ?? createLogger('weather-service');
    this.analyzer = options.analyzer ?? new ConditionAnalyzer();
    this.errorHandler = new WeatherFetchErrorHandler(
      { operation: 'fetchForecast', module: 'weather-service', data: { location: this.location } },
      this.logger
    );
  }

  getLocation(): string {
    return this.location;
  }

  /**
   * Weather forecast, or null when every attempt failed.
   */
  async fetchForecast(): Promise<ForecastResponse | null> {
    return this.errorHandler.handle(() => this.provider.fetchForecast(this.location), this.retry);
  }

  analyzeForecast(forecast: ForecastResponse | null): WeatherCondition[] {
    return this.analyzer.analyzeForecast(forecast);
  }

  async getWeatherConditions(): Promise<WeatherCondition[]> {
    const forecast = await this.fetchForecast();
    if (!forecast) {
      return [];
    }
    return this.analyzeForecast(forecast);
  }
}
