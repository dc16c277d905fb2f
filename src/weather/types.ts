/**
 * Weather domain types
 */

export type Severity = 'info' | 'warning' | 'severe' | 'extreme';

export type ConditionType = 'temperature' | 'wind' | 'precipitation' | 'weather';

export const SEVERITY_LEVELS: Readonly<Record<Severity, number>> = {
  info: 0,
  warning: 1,
  severe: 2,
  extreme: 3
};

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_LEVELS, value);
}

/**
 * Unknown severities rank lowest.
 */
export function severityRank(severity: string): number {
  return isSeverity(severity) ? SEVERITY_LEVELS[severity] : 0;
}

/**
 * A potentially dangerous condition detected in the forecast.
 */
export interface WeatherCondition {
  type: ConditionType;
  severity: Severity;
  description: string;
  value: number;
  unit: string;
  /** Forecast slot the condition was detected in */
  forecastTime?: Date;
}

export interface WeatherThresholds {
  temperature: {
    /** °C */
    extremeHigh: number;
    extremeLow: number;
    warningHigh: number;
    warningLow: number;
  };
  wind: {
    /** km/h */
    severe: number;
    warning: number;
  };
  precipitation: {
    /** mm in 3 hours */
    heavyRain3h: number;
    heavySnow3h: number;
  };
  /** Matched against the lower-cased `weather[].main` of each entry */
  severeConditions: string[];
}

export const DEFAULT_THRESHOLDS: WeatherThresholds = {
  temperature: {
    extremeHigh: 40,
    extremeLow: -15,
    warningHigh: 35,
    warningLow: -10
  },
  wind: {
    severe: 75,
    warning: 50
  },
  precipitation: {
    heavyRain3h: 50,
    heavySnow3h: 20
  },
  severeConditions: ['thunderstorm', 'hurricane', 'tornado', 'cyclone', 'typhoon', 'blizzard']
};

// OpenWeatherMap 5 day / 3 hour forecast, units=metric

export interface ForecastWeather {
  id?: number;
  main: string;
  description: string;
  icon?: string;
}

export interface ForecastEntry {
  /** Unix seconds */
  dt?: number;
  dt_txt?: string;
  main: {
    /** °C */
    temp: number;
    feels_like?: number;
    humidity?: number;
  };
  wind: {
    /** m/s */
    speed: number;
    deg?: number;
    gust?: number;
  };
  weather?: ForecastWeather[];
  rain?: { '3h'?: number };
  snow?: { '3h'?: number };
}

export interface ForecastCity {
  name?: string;
  country?: string;
  timezone?: number;
}

export interface ForecastResponse {
  list: ForecastEntry[];
  city?: ForecastCity;
}
