/**
 * System Core
 *
 * Wires the weather service, alert system, scheduler and monitoring
 * together and owns the check cycle and the start / stop lifecycle.
 */

import { AlertSystem } from '../alerts/alert-system';
import { ConditionAnalyzer } from '../weather/condition-analyzer';
import { WeatherCondition } from '../weather/types';
import { WeatherClient } from '../weather/weather-client';
import { WeatherService } from '../weather/weather-service';
import { AppConfig, validateConfig } from './config';
import { AlertError, AlertErrorType } from './error-handling';
import { Logger, createLogger } from './logger';
import { MetricsCollector } from './monitoring';
import {
  NotificationAdapter,
  NotificationManager,
  PushoverNotificationAdapter,
  WebhookNotificationAdapter
} from './notification';
import { Scheduler } from './scheduler';

export const WEATHER_CHECK_TASK_ID = 'weather-check';

export interface CheckResult {
  /** Every condition found in the forecast */
  conditions: WeatherCondition[];
  notified: boolean;
  /** milliseconds */
  duration: number;
  error?: string;
}

export interface ComponentHealth {
  healthy: boolean;
  message?: string;
}

export interface SystemHealth {
  healthy: boolean;
  components: Record<string, ComponentHealth>;
}

export interface WeatherAlertSystemDeps {
  config: AppConfig;
  weatherService: WeatherService;
  alertSystem: AlertSystem;
  notificationManager: NotificationManager;
  scheduler?: Scheduler;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export function createNotificationAdapters(config: AppConfig): NotificationAdapter[] {
  const { pushover, webhook } = config.notification;
  const adapters: NotificationAdapter[] = [];

  if (pushover.userKey || pushover.appToken) {
    adapters.push(
      new PushoverNotificationAdapter({
        userKey: pushover.userKey,
        appToken: pushover.appToken,
        apiUrl: pushover.apiUrl,
        retry: config.retry
      })
    );
  }
  if (webhook.url) {
    adapters.push(new WebhookNotificationAdapter({ url: webhook.url }));
  }

  return adapters;
}

export class WeatherAlertSystem {
  public readonly config: AppConfig;
  public readonly weatherService: WeatherService;
  public readonly alertSystem: AlertSystem;
  public readonly notification: NotificationManager;
  public readonly scheduler: Scheduler;
  public readonly monitoring: MetricsCollector;

  private readonly logger: Logger;
  private isStarted = false;

  constructor(deps: WeatherAlertSystemDeps) {
    this.config = deps.config;
    this.weatherService = deps.weatherService;
    this.alertSystem = deps.alertSystem;
    this.notification = deps.notificationManager;
    this.logger = deps.logger ?? createLogger('system');
    this.scheduler =
      deps.scheduler ??
      new Scheduler({ timezone: deps.config.scheduler.timezone, taskTimeout: deps.config.scheduler.taskTimeout });
    this.monitoring = deps.metrics ?? new MetricsCollector();
  }

  /**
   * Build the production pipeline from configuration.
   */
  static fromConfig(config: AppConfig): WeatherAlertSystem {
    const client = new WeatherClient({
      apiKey: config.weather.apiKey,
      baseUrl: config.weather.baseUrl,
      timeout: config.weather.timeout
    });

    const weatherService = new WeatherService(client, {
      location: config.weather.location,
      retry: config.retry,
      analyzer: new ConditionAnalyzer(config.thresholds)
    });

    const notificationManager = new NotificationManager(createNotificationAdapters(config));

    const alertSystem = new AlertSystem(notificationManager, {
      notificationThreshold: config.notification.threshold,
      defaultTitle: config.notification.title,
      location: config.weather.location,
      cooldownMs: config.notification.cooldownMinutes * 60000
    });

    return new WeatherAlertSystem({ config, weatherService, alertSystem, notificationManager });
  }

  /**
   * One weather check cycle. Never throws; failures are logged and recorded.
   */
  async checkWeather(): Promise<CheckResult> {
    const startTime = Date.now();
    const location = this.weatherService.getLocation();

    try {
      const forecast = await this.weatherService.fetchForecast();
      if (!forecast) {
        const duration = Date.now() - startTime;
        this.monitoring.recordWeatherCheck(false, location);
        this.monitoring.recordCheckDuration(duration);
        return { conditions: [], notified: false, duration, error: 'Weather data unavailable' };
      }

      const conditions = this.weatherService.analyzeForecast(forecast);
      this.monitoring.recordWeatherCheck(true, location);
      this.monitoring.recordConditionsDetected(conditions.length, location);
      this.logger.info(`Weather check for ${location} found ${conditions.length} condition(s)`, undefined, 'checkWeather');

      const dispatch = await this.alertSystem.dispatch(conditions);
      if (dispatch.conditions.length > 0) {
        this.monitoring.recordNotification(dispatch.sent);
      }

      const duration = Date.now() - startTime;
      this.monitoring.recordCheckDuration(duration);
      return { conditions, notified: dispatch.sent, duration };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const duration = Date.now() - startTime;
      this.logger.error(`Error in weather check: ${err.message}`, err, undefined, 'checkWeather');
      this.monitoring.recordWeatherCheck(false, location);
      this.monitoring.recordCheckDuration(duration);
      return { conditions: [], notified: false, duration, error: err.message };
    }
  }

  /**
   * Validate configuration, schedule the weather check and optionally run it
   * once immediately.
   */
  async start(): Promise<void> {
    if (this.isStarted) {
      this.logger.warn('System is already started');
      return;
    }

    const configErrors = validateConfig(this.config);
    if (configErrors.length > 0) {
      throw new AlertError(`Invalid configuration: ${configErrors.join('; ')}`, AlertErrorType.CONFIGURATION_ERROR, {
        operation: 'start',
        details: { errors: configErrors }
      });
    }

    const channels = await this.notification.getAvailableAdapters();
    if (channels.length === 0) {
      this.logger.warn('No notification channels configured; alerts will only be logged');
    }

    const { schedule } = this.config.scheduler;
    this.scheduler.addTask({
      id: WEATHER_CHECK_TASK_ID,
      name: 'Weather Check',
      cronExpression: schedule,
      enabled: true,
      description: `Check the forecast for ${this.weatherService.getLocation()}`,
      handler: () => this.checkWeather()
    });
    this.scheduler.start();
    this.isStarted = true;

    this.logger.info('Weather Alert System started', {
      location: this.weatherService.getLocation(),
      schedule,
      threshold: this.alertSystem.getNotificationThreshold(),
      channels
    });

    if (this.config.scheduler.runOnStart) {
      await this.scheduler.executeTask(WEATHER_CHECK_TASK_ID);
    }
  }

  async stop(): Promise<void> {
    if (!this.isStarted) {
      return;
    }

    this.scheduler.stop();
    this.scheduler.removeTask(WEATHER_CHECK_TASK_ID);
    this.isStarted = false;
    this.logger.info('Weather Alert System stopped');
  }

  isRunning(): boolean {
    return this.isStarted;
  }

  async getHealth(): Promise<SystemHealth> {
    const components: Record<string, ComponentHealth> = {};

    const status = this.scheduler.getTaskStatus(WEATHER_CHECK_TASK_ID);
    components.scheduler = status
      ? {
          healthy: status.isScheduled,
          message: status.isScheduled ? `Runs on '${this.config.scheduler.schedule}'` : 'Weather check is not scheduled'
        }
      : { healthy: false, message: 'Weather check task not registered' };

    const channels = await this.notification.getAvailableAdapters();
    components.notification = {
      healthy: channels.length > 0,
      message: channels.length > 0 ? `Available channels: ${channels.join(', ')}` : 'No notification channels available'
    };

    const monitoring = await this.monitoring.healthCheck();
    components.monitoring = {
      healthy: monitoring.healthy,
      message: Object.entries(monitoring.checks)
        .map(([name, passed]) => `${name}=${passed}`)
        .join(', ')
    };

    const healthy = Object.values(components).every(component => component.healthy);
    return { healthy, components };
  }
}
