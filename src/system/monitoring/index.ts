/**
 * Monitoring Module
 *
 * Tracks weather checks, detected conditions and notification deliveries,
 * and reports system health from them.
 */

export interface Metric {
  name: string;
  value: number;
  timestamp: Date;
  tags?: Record<string, string>;
}

export interface HealthCheckResult {
  healthy: boolean;
  checks: Record<string, boolean>;
  message?: string;
  timestamp: Date;
}

export interface MonitoringOptions {
  /** Days of metrics kept in memory */
  retentionPeriod: number;
  /** A check must have run within this window to count as active (ms) */
  activityWindow: number;
  /** Minimum percentage of successful checks */
  checkSuccessRateThreshold: number;
}

export const METRIC_NAMES = {
  WEATHER_CHECK: 'weather_check',
  CONDITIONS_DETECTED: 'conditions_detected',
  NOTIFICATION_SENT: 'notification_sent',
  CHECK_DURATION: 'check_duration'
} as const;

const DAY_MS = 86400000;

export class MetricsCollector {
  private metrics: Metric[] = [];
  private readonly options: MonitoringOptions;
  private readonly now: () => Date;

  constructor(options: Partial<MonitoringOptions> = {}, now: () => Date = () => new Date()) {
    this.options = {
      retentionPeriod: 7,
      activityWindow: 2 * 3600000,
      checkSuccessRateThreshold: 80,
      ...options
    };
    this.now = now;
  }

  record(metric: Omit<Metric, 'timestamp'>): void {
    this.metrics.push({
      ...metric,
      timestamp: this.now()
    });

    this.cleanup();
  }

  recordWeatherCheck(success: boolean, location: string): void {
    this.record({
      name: METRIC_NAMES.WEATHER_CHECK,
      value: success ? 1 : 0,
      tags: { location, success: success.toString() }
    });
  }

  recordConditionsDetected(count: number, location: string): void {
    this.record({
      name: METRIC_NAMES.CONDITIONS_DETECTED,
      value: count,
      tags: { location }
    });
  }

  recordNotification(success: boolean): void {
    this.record({
      name: METRIC_NAMES.NOTIFICATION_SENT,
      value: success ? 1 : 0,
      tags: { success: success.toString() }
    });
  }

  recordCheckDuration(durationMs: number): void {
    this.record({
      name: METRIC_NAMES.CHECK_DURATION,
      value: durationMs,
      tags: { unit: 'milliseconds' }
    });
  }

  getMetrics(startTime: Date, endTime: Date, name?: string): Metric[] {
    return this.metrics.filter(metric => {
      const inTimeRange = metric.timestamp >= startTime && metric.timestamp <= endTime;
      const nameMatches = !name || metric.name === name;
      return inTimeRange && nameMatches;
    });
  }

  getLatest(name: string): Metric | undefined {
    for (let i = this.metrics.length - 1; i >= 0; i--) {
      if (this.metrics[i].name === name) {
        return this.metrics[i];
      }
    }
    return undefined;
  }

  /**
   * Percentage of successful weather checks; 100 when there were none.
   */
  calculateCheckSuccessRate(startTime: Date, endTime: Date): number {
    const checks = this.getMetrics(startTime, endTime, METRIC_NAMES.WEATHER_CHECK);
    if (checks.length === 0) return 100;

    const successes = checks.filter(m => m.value === 1).length;
    return (successes / checks.length) * 100;
  }

  calculateAverageCheckDuration(startTime: Date, endTime: Date): number {
    const durations = this.getMetrics(startTime, endTime, METRIC_NAMES.CHECK_DURATION);
    if (durations.length === 0) return 0;

    const total = durations.reduce((sum, m) => sum + m.value, 0);
    return total / durations.length;
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const now = this.now();
    const windowStart = new Date(now.getTime() - this.options.activityWindow);
    const lastCheck = this.getLatest(METRIC_NAMES.WEATHER_CHECK);

    const checks: Record<string, boolean> = {
      recent_activity: lastCheck !== undefined && lastCheck.timestamp >= windowStart,
      last_check_succeeded: lastCheck?.value === 1,
      check_success_rate:
        this.calculateCheckSuccessRate(new Date(now.getTime() - DAY_MS), now) >= this.options.checkSuccessRateThreshold
    };

    const allHealthy = Object.values(checks).every(check => check);

    return {
      healthy: allHealthy,
      checks,
      message: allHealthy ? 'All systems operational' : 'Some health checks failed',
      timestamp: now
    };
  }

  clear(): void {
    this.metrics = [];
  }

  private cleanup(): void {
    const retentionDate = new Date(this.now().getTime() - this.options.retentionPeriod * DAY_MS);
    this.metrics = this.metrics.filter(m => m.timestamp > retentionDate);
  }
}
