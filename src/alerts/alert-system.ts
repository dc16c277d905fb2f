/**
 * Alert System
 *
 * Decides which weather conditions are worth a notification, formats the
 * message and sends it through the notification manager.
 */

import { Logger, createLogger } from '../system/logger';
import {
  NotificationManager,
  NotificationPriority,
  NotificationResult
} from '../system/notification';
import { Severity, WeatherCondition, severityRank } from '../weather/types';
import { AlertDeduplicator } from './deduplicator';

export interface AlertSystemOptions {
  /** Minimum severity to trigger a notification */
  notificationThreshold?: Severity;
  /** Used when sendNotification() gets no title */
  defaultTitle?: string;
  /** Shown in the message header */
  location?: string;
  /** 0 disables repeat suppression */
  cooldownMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export interface AlertDispatch {
  sent: boolean;
  conditions: WeatherCondition[];
  message?: string;
  results: NotificationResult[];
}

const CONDITION_ICONS: Partial<Record<WeatherCondition['type'], string>> = {
  temperature: '🌡️',
  wind: '💨',
  precipitation: '🌧️'
};

const PRIORITY_BY_SEVERITY: Record<Severity, NotificationPriority> = {
  info: 'low',
  warning: 'medium',
  severe: 'high',
  extreme: 'critical'
};

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function formatForecastTime(time: Date): string {
  return `${time.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function formatConditionLine(condition: WeatherCondition): string {
  const icon = CONDITION_ICONS[condition.type];
  const label = `${capitalize(condition.severity)} ${condition.description}`;
  const line = icon ? `${icon} ${label}: ${condition.value}${condition.unit}` : `⚡ ${label}`;
  return condition.forecastTime ? `${line} (${formatForecastTime(condition.forecastTime)})` : line;
}

export class AlertSystem {
  private readonly notificationManager: NotificationManager;
  private readonly notificationThreshold: Severity;
  private readonly defaultTitle: string;
  private readonly location?: string;
  private readonly deduplicator: AlertDeduplicator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(notificationManager: NotificationManager, options: AlertSystemOptions = {}) {
    this.notificationManager = notificationManager;
    this.notificationThreshold = options.notificationThreshold ?? 'warning';
    this.defaultTitle = options.defaultTitle ?? 'Weather Alert System';
    this.location = options.location;
    this.deduplicator = new AlertDeduplicator(options.cooldownMs ?? 0);
    this.logger = options.logger ?? createLogger('alert-system');
    this.now = options.now ?? (() => new Date());
  }

  getNotificationThreshold(): Severity {
    return this.notificationThreshold;
  }

  /**
   * Conditions at or above the notification threshold.
   */
  filterConditions(conditions: WeatherCondition[]): WeatherCondition[] {
    const minimum = severityRank(this.notificationThreshold);
    return conditions.filter(condition => severityRank(condition.severity) >= minimum);
  }

  formatConditionMessage(conditions: WeatherCondition[]): string {
    if (conditions.length === 0) {
      return 'No significant weather conditions detected.';
    }

    const header = this.location ? `⚠️ Weather Alert for ${this.location}:` : '⚠️ Weather Alert:';
    return [header, '', ...conditions.map(formatConditionLine)].join('\n');
  }

  /**
   * Priority of a notification about these conditions, from the highest
   * severity among them.
   */
  getPriority(conditions: WeatherCondition[]): NotificationPriority {
    const highest = conditions.reduce<Severity>(
      (max, condition) => (severityRank(condition.severity) > severityRank(max) ? condition.severity : max),
      'info'
    );
    return PRIORITY_BY_SEVERITY[highest];
  }

  /**
   * Conditions that would be notified now: over the threshold and not
   * suppressed by the cooldown.
   */
  selectConditions(conditions: WeatherCondition[]): WeatherCondition[] {
    return this.deduplicator.filterNew(this.filterConditions(conditions), this.now());
  }

  /**
   * Send a push notification for the conditions. Returns whether at least
   * one channel delivered it.
   */
  async sendNotification(conditions: WeatherCondition[], title?: string): Promise<boolean> {
    const dispatch = await this.dispatch(conditions, title);
    return dispatch.sent;
  }

  async dispatch(conditions: WeatherCondition[], title?: string): Promise<AlertDispatch> {
    const filtered = this.filterConditions(conditions);
    if (filtered.length === 0) {
      this.logger.info('No conditions meet notification threshold', { threshold: this.notificationThreshold });
      return { sent: false, conditions: [], results: [] };
    }

    const fresh = this.deduplicator.filterNew(filtered, this.now());
    if (fresh.length === 0) {
      this.logger.info(`All ${filtered.length} condition(s) were already notified within the cooldown`);
      return { sent: false, conditions: [], results: [] };
    }

    const message = this.formatConditionMessage(fresh);

    let results: NotificationResult[];
    try {
      results = await this.notificationManager.send({
        title: title ?? this.defaultTitle,
        content: message,
        priority: this.getPriority(fresh),
        metadata: {
          location: this.location,
          conditionCount: fresh.length
        }
      });
    } catch (error) {
      this.logger.error('Failed to send notification', error instanceof Error ? error : new Error(String(error)));
      return { sent: false, conditions: fresh, message, results: [] };
    }

    const sent = results.some(result => result.success);
    if (sent) {
      this.deduplicator.markNotified(fresh, this.now());
      this.logger.info(`Notification sent for ${fresh.length} condition(s)`, {
        channels: results.filter(result => result.success).map(result => result.channel)
      });
    } else if (results.length === 0) {
      this.logger.error('Failed to send notification: no notification channels configured');
    } else {
      this.logger.error('Failed to send notification', undefined, {
        errors: results.map(result => `${result.channel}: ${result.error ?? 'unknown error'}`)
      });
    }

    return { sent, conditions: fresh, message, results };
  }
}
