/**
 * Configuration Management Module
 *
 * Merges defaults, an optional YAML file and environment variables into the
 * application configuration. Environment variables win over the file.
 */

import fs from 'fs';
import yaml from 'js-yaml';
import cron from 'node-cron';
import { DEFAULT_RETRY_OPTIONS, RetryOptions } from '../error-handling';
import { LogLevel, isLogLevel } from '../logger';
import { isRecord, isStringArray } from '../utils/type-guards';
import { DEFAULT_THRESHOLDS, Severity, WeatherThresholds, isSeverity } from '../../weather/types';
import { EnvLoader, EnvSource } from './env';

export * from './env';

export type Environment = 'development' | 'staging' | 'production';

export interface WeatherConfig {
  apiKey: string;
  baseUrl: string;
  /** City query passed to OpenWeatherMap, e.g. `London,UK` */
  location: string;
  /** Request timeout (ms) */
  timeout: number;
}

export interface NotificationConfig {
  pushover: {
    userKey: string;
    appToken: string;
    apiUrl: string;
  };
  webhook: {
    url: string;
  };
  /** Minimum severity that triggers a notification */
  threshold: Severity;
  title: string;
  /** 0 disables repeat suppression */
  cooldownMinutes: number;
}

export interface SchedulerSettings {
  /** Cron expression for the weather check */
  schedule: string;
  timezone: string;
  runOnStart: boolean;
  /** milliseconds */
  taskTimeout: number;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Log file used by the long-running process; null disables it */
  file: string | null;
}

export interface AppConfig {
  weather: WeatherConfig;
  thresholds: WeatherThresholds;
  notification: NotificationConfig;
  scheduler: SchedulerSettings;
  retry: RetryOptions;
  logging: LoggingConfig;
  environment: Environment;
}

export interface ConfigManagerOptions {
  env?: EnvSource;
  /** YAML file; defaults to WEATHER_ALERT_CONFIG or config/weather-alert.yaml */
  configPath?: string;
}

export const DEFAULT_CONFIG_PATH = 'config/weather-alert.yaml';

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production'];

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some(environment => environment === value);
}

export function maskSecret(value: string): string {
  if (!value) return '';
  return value.length <= 4 ? '****' : `${value.slice(0, 4)}****`;
}

export function createDefaultConfig(): AppConfig {
  return {
    weather: {
      apiKey: '',
      baseUrl: 'https://api.openweathermap.org/data/2.5',
      location: 'London,UK',
      timeout: 10000
    },
    thresholds: {
      temperature: { ...DEFAULT_THRESHOLDS.temperature },
      wind: { ...DEFAULT_THRESHOLDS.wind },
      precipitation: { ...DEFAULT_THRESHOLDS.precipitation },
      severeConditions: [...DEFAULT_THRESHOLDS.severeConditions]
    },
    notification: {
      pushover: {
        userKey: '',
        appToken: '',
        apiUrl: 'https://api.pushover.net/1/messages.json'
      },
      webhook: {
        url: ''
      },
      threshold: 'warning',
      title: 'Weather Alert System',
      cooldownMinutes: 0
    },
    scheduler: {
      schedule: '0 * * * *', // hourly
      timezone: 'UTC',
      runOnStart: true,
      taskTimeout: 300000
    },
    retry: { ...DEFAULT_RETRY_OPTIONS },
    logging: {
      level: LogLevel.INFO,
      file: 'weather_alert.log'
    },
    environment: 'development'
  };
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  const { weather, thresholds, scheduler, retry } = config;

  if (!weather.apiKey) {
    errors.push('OPENWEATHERMAP_API_KEY is required');
  }
  if (!weather.location) {
    errors.push('LOCATION must not be empty');
  }
  if (!cron.validate(scheduler.schedule)) {
    errors.push(`Invalid check schedule: ${scheduler.schedule}`);
  }

  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
    errors.push('Retry max attempts must be a positive integer');
  }
  if (retry.minDelay > retry.maxDelay) {
    errors.push('Retry min delay must not exceed max delay');
  }

  if (thresholds.temperature.extremeHigh < thresholds.temperature.warningHigh) {
    errors.push('Extreme high temperature must not be below the warning high temperature');
  }
  if (thresholds.temperature.extremeLow > thresholds.temperature.warningLow) {
    errors.push('Extreme low temperature must not be above the warning low temperature');
  }
  if (thresholds.wind.severe < thresholds.wind.warning) {
    errors.push('Severe wind speed must not be below the warning wind speed');
  }

  return errors;
}

export class ConfigManager {
  private config: AppConfig;
  private readonly env: EnvLoader;
  private readonly configPath: string;
  private readonly explicitPath: boolean;
  /** Problems found while loading; reported by validate() */
  private loadErrors: string[] = [];

  constructor(options: ConfigManagerOptions = {}) {
    this.env = new EnvLoader(options.env ?? process.env);
    const envPath = this.env.get('WEATHER_ALERT_CONFIG');
    this.configPath = options.configPath ?? envPath ?? DEFAULT_CONFIG_PATH;
    this.explicitPath = options.configPath !== undefined || envPath !== undefined;
    this.config = createDefaultConfig();
    this.loadConfig();
  }

  getConfig(): AppConfig {
    return structuredClone(this.config);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Apply command-line overrides on top of the loaded configuration.
   */
  applyOverrides(overrides: {
    location?: string;
    threshold?: string;
    schedule?: string;
    runOnStart?: boolean;
  }): void {
    if (overrides.location) {
      this.config.weather.location = overrides.location;
    }
    if (overrides.threshold !== undefined) {
      this.setThreshold(overrides.threshold, '--threshold');
    }
    if (overrides.schedule) {
      this.config.scheduler.schedule = overrides.schedule;
    }
    if (overrides.runOnStart !== undefined) {
      this.config.scheduler.runOnStart = overrides.runOnStart;
    }
  }

  reload(): void {
    this.config = createDefaultConfig();
    this.loadErrors = [];
    this.loadConfig();
  }

  /**
   * Names of the notification channels that have credentials.
   */
  getNotificationChannels(): string[] {
    const channels: string[] = [];
    const { pushover, webhook } = this.config.notification;
    if (pushover.userKey && pushover.appToken) channels.push('pushover');
    if (webhook.url) channels.push('webhook');
    return channels;
  }

  /**
   * Copy of the configuration that is safe to print.
   */
  getMaskedConfig(): AppConfig {
    const masked = this.getConfig();
    masked.weather.apiKey = maskSecret(masked.weather.apiKey);
    masked.notification.pushover.userKey = maskSecret(masked.notification.pushover.userKey);
    masked.notification.pushover.appToken = maskSecret(masked.notification.pushover.appToken);
    return masked;
  }

  /**
   * Problems found while loading plus those in the merged configuration.
   */
  validate(): string[] {
    return [...this.loadErrors, ...validateConfig(this.config)];
  }

  private loadConfig(): void {
    const fileConfig = this.loadFileConfig();
    if (fileConfig) {
      this.applyFileConfig(fileConfig);
    }

    this.applyEnvironmentOverrides();
  }

  private loadFileConfig(): Record<string, unknown> | null {
    if (!fs.existsSync(this.configPath)) {
      if (this.explicitPath) {
        this.loadErrors.push(`Configuration file not found: ${this.configPath}`);
      }
      return null;
    }

    try {
      const parsed: unknown = yaml.load(fs.readFileSync(this.configPath, 'utf8'));
      if (parsed === undefined || parsed === null) {
        return null;
      }
      if (!isRecord(parsed)) {
        this.loadErrors.push(`Configuration file ${this.configPath} must contain a mapping`);
        return null;
      }
      return parsed;
    } catch (error) {
      this.loadErrors.push(
        `Failed to load configuration file ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }

  private applyFileConfig(file: Record<string, unknown>): void {
    const weather = section(file, 'weather');
    assignString(weather, 'location', value => (this.config.weather.location = value));
    assignString(weather, 'baseUrl', value => (this.config.weather.baseUrl = value));
    assignNumber(weather, 'timeout', value => (this.config.weather.timeout = value));

    const thresholds = section(file, 'thresholds');
    const temperature = section(thresholds, 'temperature');
    const t = this.config.thresholds.temperature;
    assignNumber(temperature, 'extremeHigh', value => (t.extremeHigh = value));
    assignNumber(temperature, 'extremeLow', value => (t.extremeLow = value));
    assignNumber(temperature, 'warningHigh', value => (t.warningHigh = value));
    assignNumber(temperature, 'warningLow', value => (t.warningLow = value));

    const wind = section(thresholds, 'wind');
    assignNumber(wind, 'severe', value => (this.config.thresholds.wind.severe = value));
    assignNumber(wind, 'warning', value => (this.config.thresholds.wind.warning = value));

    const precipitation = section(thresholds, 'precipitation');
    assignNumber(precipitation, 'heavyRain3h', value => (this.config.thresholds.precipitation.heavyRain3h = value));
    assignNumber(precipitation, 'heavySnow3h', value => (this.config.thresholds.precipitation.heavySnow3h = value));

    if (isStringArray(thresholds.severeConditions)) {
      this.config.thresholds.severeConditions = thresholds.severeConditions.map(c => c.toLowerCase());
    }

    const notification = section(file, 'notification');
    assignString(notification, 'threshold', value => this.setThreshold(value, 'notification.threshold'));
    assignString(notification, 'title', value => (this.config.notification.title = value));
    assignNumber(notification, 'cooldownMinutes', value => (this.config.notification.cooldownMinutes = value));

    const scheduler = section(file, 'scheduler');
    assignString(scheduler, 'schedule', value => (this.config.scheduler.schedule = value));
    assignString(scheduler, 'timezone', value => (this.config.scheduler.timezone = value));
    if (typeof scheduler.runOnStart === 'boolean') {
      this.config.scheduler.runOnStart = scheduler.runOnStart;
    }
    assignNumber(scheduler, 'taskTimeout', value => (this.config.scheduler.taskTimeout = value));

    const retry = section(file, 'retry');
    assignNumber(retry, 'maxAttempts', value => (this.config.retry.maxAttempts = value));
    assignNumber(retry, 'baseDelay', value => (this.config.retry.baseDelay = value));
    assignNumber(retry, 'minDelay', value => (this.config.retry.minDelay = value));
    assignNumber(retry, 'maxDelay', value => (this.config.retry.maxDelay = value));
  }

  private applyEnvironmentOverrides(): void {
    const env = this.env;
    const config = this.config;

    const environment = env.get('NODE_ENV');
    if (environment && isEnvironment(environment)) {
      config.environment = environment;
    }

    const logLevel = env.get('LOG_LEVEL')?.toLowerCase();
    if (logLevel !== undefined) {
      if (isLogLevel(logLevel)) {
        config.logging.level = logLevel;
      } else {
        this.loadErrors.push(`Invalid LOG_LEVEL '${logLevel}'`);
      }
    }
    const logFile = env.get('LOG_FILE');
    if (logFile !== undefined) {
      config.logging.file = ['none', 'off', 'false'].includes(logFile.toLowerCase()) ? null : logFile;
    }

    // Weather
    config.weather.apiKey = env.get('OPENWEATHERMAP_API_KEY', config.weather.apiKey) ?? '';
    config.weather.baseUrl = env.get('OPENWEATHERMAP_BASE_URL', config.weather.baseUrl) ?? config.weather.baseUrl;
    config.weather.location = env.get('LOCATION', config.weather.location) ?? config.weather.location;
    this.readNumber('WEATHER_REQUEST_TIMEOUT', value => (config.weather.timeout = value));

    // Notification
    const { pushover } = config.notification;
    pushover.userKey = env.get('PUSHOVER_USER_KEY', pushover.userKey) ?? '';
    pushover.appToken = env.get('PUSHOVER_APP_TOKEN', pushover.appToken) ?? '';
    pushover.apiUrl = env.get('PUSHOVER_API_URL', pushover.apiUrl) ?? pushover.apiUrl;
    config.notification.webhook.url = env.get('WEBHOOK_URL', config.notification.webhook.url) ?? '';

    const threshold = env.get('NOTIFICATION_THRESHOLD');
    if (threshold !== undefined) {
      this.setThreshold(threshold, 'NOTIFICATION_THRESHOLD');
    }
    config.notification.title = env.get('NOTIFICATION_TITLE', config.notification.title) ?? config.notification.title;
    this.readNumber('ALERT_COOLDOWN_MINUTES', value => (config.notification.cooldownMinutes = value));

    // Scheduler
    config.scheduler.schedule = env.get('CHECK_SCHEDULE', config.scheduler.schedule) ?? config.scheduler.schedule;
    config.scheduler.timezone = env.get('SCHEDULER_TIMEZONE', config.scheduler.timezone) ?? config.scheduler.timezone;
    config.scheduler.runOnStart = env.getBoolean('RUN_ON_START', config.scheduler.runOnStart) ?? config.scheduler.runOnStart;

    // Retry
    const { retry } = config;
    this.readNumber('RETRY_MAX_ATTEMPTS', value => (retry.maxAttempts = value));
    this.readNumber('RETRY_BASE_DELAY', value => (retry.baseDelay = value));
    this.readNumber('RETRY_MIN_DELAY', value => (retry.minDelay = value));
    this.readNumber('RETRY_MAX_DELAY', value => (retry.maxDelay = value));
  }

  private readNumber(key: string, assign: (value: number) => void): void {
    const raw = this.env.get(key);
    if (raw === undefined) {
      return;
    }
    const value = this.env.getNumber(key);
    if (value === undefined) {
      this.loadErrors.push(`Invalid ${key} '${raw}' (expected a number)`);
      return;
    }
    assign(value);
  }

  private setThreshold(value: string, source: string): void {
    const severity = value.trim().toLowerCase();
    if (isSeverity(severity)) {
      this.config.notification.threshold = severity;
    } else {
      this.loadErrors.push(`Invalid ${source} '${value}' (expected one of info, warning, severe, extreme)`);
    }
  }
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function assignNumber(source: Record<string, unknown>, key: string, assign: (value: number) => void): void {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    assign(value);
  }
}

function assignString(source: Record<string, unknown>, key: string, assign: (value: string) => void): void {
  const value = source[key];
  if (typeof value === 'string' && value.trim() !== '') {
    assign(value.trim());
  }
}
