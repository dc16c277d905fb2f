/**
 * Condition Analyzer
 *
 * Turns forecast entries into alert conditions using configurable thresholds.
 */

import { Logger, createLogger } from '../system/logger';
import { isRecord } from '../system/utils/type-guards';
import {
  DEFAULT_THRESHOLDS,
  ForecastEntry,
  ForecastResponse,
  WeatherCondition,
  WeatherThresholds
} from './types';

const MS_TO_KMH = 3.6;

function roundValue(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Forecast slot time from `dt` (unix seconds) or `dt_txt` (UTC).
 */
export function getForecastTime(entry: ForecastEntry): Date | undefined {
  if (entry.dt !== undefined) {
    return new Date(entry.dt * 1000);
  }
  if (entry.dt_txt) {
    const parsed = new Date(`${entry.dt_txt.replace(' ', 'T')}Z`);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
}

export class ConditionAnalyzer {
  private readonly thresholds: WeatherThresholds;
  private readonly logger: Logger;

  constructor(thresholds: WeatherThresholds = DEFAULT_THRESHOLDS, logger?: Logger) {
    this.thresholds = thresholds;
    this.logger = logger ?? createLogger('condition-analyzer');
  }

  getThresholds(): WeatherThresholds {
    return this.thresholds;
  }

  /**
   * Analyze forecast data and detect potentially dangerous conditions.
   */
  analyzeForecast(forecast: ForecastResponse | null | undefined): WeatherCondition[] {
    if (!isRecord(forecast) || !Array.isArray(forecast.list)) {
      this.logger.warn('Invalid forecast data', undefined, 'analyzeForecast');
      return [];
    }

    const conditions: WeatherCondition[] = [];
    for (const entry of forecast.list) {
      conditions.push(...this.analyzeEntry(entry));
    }

    this.logger.debug(`Detected ${conditions.length} condition(s) in ${forecast.list.length} forecast entries`);
    return conditions;
  }

  analyzeEntry(entry: ForecastEntry): WeatherCondition[] {
    const forecastTime = getForecastTime(entry);
    const withTime = (condition: WeatherCondition): WeatherCondition =>
      forecastTime ? { ...condition, forecastTime } : condition;

    return [
      this.checkTemperature(entry),
      this.checkWind(entry),
      this.checkRain(entry),
      this.checkSnow(entry),
      ...this.checkSevereWeather(entry)
    ]
      .filter((condition): condition is WeatherCondition => condition !== null)
      .map(withTime);
  }

  private checkTemperature(entry: ForecastEntry): WeatherCondition | null {
    const { temperature } = this.thresholds;
    const temp = entry.main.temp;
    const condition = (severity: WeatherCondition['severity'], description: string): WeatherCondition => ({
      type: 'temperature',
      severity,
      description,
      value: roundValue(temp),
      unit: '°C'
    });

    if (temp > temperature.extremeHigh) return condition('extreme', 'Extreme Heat');
    if (temp < temperature.extremeLow) return condition('extreme', 'Extreme Cold');
    if (temp > temperature.warningHigh) return condition('warning', 'High Temperature');
    if (temp < temperature.warningLow) return condition('warning', 'Low Temperature');
    return null;
  }

  private checkWind(entry: ForecastEntry): WeatherCondition | null {
    const { wind } = this.thresholds;
    const windSpeed = entry.wind.speed * MS_TO_KMH;
    const value = roundValue(windSpeed);

    if (windSpeed > wind.severe) {
      return { type: 'wind', severity: 'severe', description: 'High Winds', value, unit: 'km/h' };
    }
    if (windSpeed > wind.warning) {
      return { type: 'wind', severity: 'warning', description: 'Strong Winds', value, unit: 'km/h' };
    }
    return null;
  }

  private checkRain(entry: ForecastEntry): WeatherCondition | null {
    const volume = entry.rain?.['3h'];
    if (volume === undefined || volume <= this.thresholds.precipitation.heavyRain3h) {
      return null;
    }
    return { type: 'precipitation', severity: 'severe', description: 'Heavy Rain', value: roundValue(volume), unit: 'mm' };
  }

  private checkSnow(entry: ForecastEntry): WeatherCondition | null {
    const volume = entry.snow?.['3h'];
    if (volume === undefined || volume <= this.thresholds.precipitation.heavySnow3h) {
      return null;
    }
    return { type: 'precipitation', severity: 'severe', description: 'Heavy Snow', value: roundValue(volume), unit: 'mm' };
  }

  private checkSevereWeather(entry: ForecastEntry): WeatherCondition[] {
    const keywords = this.thresholds.severeConditions.map(keyword => keyword.toLowerCase());

    return (entry.weather ?? [])
      .filter(weather => {
        const main = weather.main.toLowerCase();
        return keywords.some(keyword => main.includes(keyword));
      })
      .map(weather => ({
        type: 'weather' as const,
        severity: 'severe' as const,
        description: `Severe Weather: ${weather.description}`,
        value: 0,
        unit: ''
      }));
  }
}
