import { isRecord } from '../system/utils/type-guards';
import { ForecastCity, ForecastEntry, ForecastResponse, ForecastWeather } from './types';

function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function parseVolume(value: unknown): { '3h'?: number } | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const volume = numberField(value, '3h');
  return volume === undefined ? {} : { '3h': volume };
}

function parseWeather(value: unknown): ForecastWeather[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const items: ForecastWeather[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const main = stringField(item, 'main');
    if (main === undefined) continue;
    items.push({
      id: numberField(item, 'id'),
      main,
      description: stringField(item, 'description') ?? main,
      icon: stringField(item, 'icon')
    });
  }
  return items;
}

/**
 * Parse one forecast entry. Returns null when the temperature or wind speed
 * is missing.
 */
export function parseForecastEntry(value: unknown): ForecastEntry | null {
  if (!isRecord(value) || !isRecord(value.main) || !isRecord(value.wind)) {
    return null;
  }

  const temp = numberField(value.main, 'temp');
  const speed = numberField(value.wind, 'speed');
  if (temp === undefined || speed === undefined) {
    return null;
  }

  const entry: ForecastEntry = {
    dt: numberField(value, 'dt'),
    dt_txt: stringField(value, 'dt_txt'),
    main: {
      temp,
      feels_like: numberField(value.main, 'feels_like'),
      humidity: numberField(value.main, 'humidity')
    },
    wind: {
      speed,
      deg: numberField(value.wind, 'deg'),
      gust: numberField(value.wind, 'gust')
    },
    weather: parseWeather(value.weather)
  };

  const rain = parseVolume(value.rain);
  if (rain) entry.rain = rain;
  const snow = parseVolume(value.snow);
  if (snow) entry.snow = snow;

  return entry;
}

export interface ParsedForecast {
  forecast: ForecastResponse;
  /** Entries dropped because required fields were missing */
  skipped: number;
}

/**
 * Parse a forecast response body. Returns null when the body has no `list`
 * array.
 */
export function parseForecast(body: unknown): ParsedForecast | null {
  if (!isRecord(body) || !Array.isArray(body.list)) {
    return null;
  }

  const list: ForecastEntry[] = [];
  let skipped = 0;
  for (const item of body.list) {
    const entry = parseForecastEntry(item);
    if (entry) {
      list.push(entry);
    } else {
      skipped++;
    }
  }

  let city: ForecastCity | undefined;
  if (isRecord(body.city)) {
    city = {
      name: stringField(body.city, 'name'),
      country: stringField(body.city, 'country'),
      timezone: numberField(body.city, 'timezone')
    };
  }

  return { forecast: city ? { list, city } : { list }, skipped };
}
