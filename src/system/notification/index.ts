/**
 * Notification Module
 *
 * Multi-channel notification system with Pushover and webhook adapters.
 * Adapters are tried in order; delivery stops at the first success unless
 * the message is critical.
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import {
  AlertError,
  AlertErrorType,
  NotificationErrorHandler,
  RetryOptions,
  toError
} from '../error-handling';
import { isRecord } from '../utils/type-guards';
import { Logger, createLogger } from '../logger';

export type NotificationPriority = 'low' | 'medium' | 'high' | 'critical';

export interface NotificationMessage {
  title: string;
  content: string;
  priority?: NotificationPriority;
  metadata?: Record<string, unknown>;
}

export interface NotificationResult {
  success: boolean;
  channel: string;
  messageId?: string;
  error?: string;
  timestamp: Date;
}

export interface NotificationAdapter {
  readonly name: string;
  send(message: NotificationMessage): Promise<NotificationResult>;
  isAvailable(): Promise<boolean>;
}

/**
 * Notification history, newest first.
 */
export class NotificationHistory {
  private history: NotificationResult[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 500) {
    this.maxEntries = maxEntries;
  }

  record(result: NotificationResult): void {
    this.history.push(result);
    if (this.history.length > this.maxEntries) {
      this.history.shift();
    }
  }

  getHistory(limit?: number): NotificationResult[] {
    const sorted = this.sortNewestFirst(this.history);
    return limit ? sorted.slice(0, limit) : sorted;
  }

  getHistoryByChannel(channel: string, limit?: number): NotificationResult[] {
    const sorted = this.sortNewestFirst(this.history.filter(result => result.channel === channel));
    return limit ? sorted.slice(0, limit) : sorted;
  }

  /**
   * Percentage of successful deliveries; 100 when nothing was sent.
   */
  getSuccessRate(channel?: string): number {
    const filtered = channel
      ? this.history.filter(result => result.channel === channel)
      : this.history;

    if (filtered.length === 0) return 100;

    const successes = filtered.filter(result => result.success).length;
    return (successes / filtered.length) * 100;
  }

  clear(): void {
    this.history = [];
  }

  private sortNewestFirst(results: NotificationResult[]): NotificationResult[] {
    // Stable sort keeps insertion order for equal timestamps, reversed so the
    // latest record comes first.
    return [...results].reverse().sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}

/**
 * Base notification adapter with common functionality
 */
export abstract class BaseNotificationAdapter implements NotificationAdapter {
  abstract readonly name: string;

  protected maxTitleLength = 200;
  protected maxContentLength = 5000;

  async send(message: NotificationMessage): Promise<NotificationResult> {
    try {
      const prepared = this.prepareMessage(message);
      this.validateMessage(prepared);

      const result = await this.doSend(prepared);

      return {
        success: true,
        channel: this.name,
        messageId: result.messageId,
        timestamp: new Date()
      };
    } catch (error) {
      return {
        success: false,
        channel: this.name,
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date()
      };
    }
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract doSend(message: NotificationMessage): Promise<{ messageId?: string }>;

  /**
   * Adapter-specific shaping (truncation) before validation.
   */
  protected prepareMessage(message: NotificationMessage): NotificationMessage {
    return message;
  }

  protected validateMessage(message: NotificationMessage): void {
    if (!message.title || !message.content) {
      throw new Error('Notification title and content are required');
    }

    if (message.title.length > this.maxTitleLength) {
      throw new Error(`Notification title too long (max ${this.maxTitleLength} characters)`);
    }

    if (message.content.length > this.maxContentLength) {
      throw new Error(`Notification content too long (max ${this.maxContentLength} characters)`);
    }
  }
}

export interface PushoverConfig {
  userKey: string;
  appToken: string;
  apiUrl?: string;
  /** Request timeout (ms) */
  timeout?: number;
  /** Retry for 5xx and network failures */
  retry?: RetryOptions;
}

export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';

const PUSHOVER_PRIORITIES: Record<NotificationPriority, number> = {
  low: -1,
  medium: 0,
  high: 1,
  // Emergency priority (2) needs acknowledgement parameters; alerts stay at high.
  critical: 1
};

/**
 * Pushover push notification adapter
 */
export class PushoverNotificationAdapter extends BaseNotificationAdapter {
  readonly name = 'pushover';

  protected maxTitleLength = 250;
  protected maxContentLength = 1024;

  private readonly config: PushoverConfig;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: PushoverConfig, logger?: Logger) {
    super();
    this.config = config;
    this.logger = logger ?? createLogger('notification.pushover');
    this.http = axios.create({ timeout: config.timeout ?? 10000 });
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.userKey && this.config.appToken);
  }

  protected prepareMessage(message: NotificationMessage): NotificationMessage {
    return {
      ...message,
      title: truncate(message.title, this.maxTitleLength),
      content: truncate(message.content, this.maxContentLength)
    };
  }

  protected async doSend(message: NotificationMessage): Promise<{ messageId?: string }> {
    if (!this.config.userKey || !this.config.appToken) {
      throw new AlertError('Pushover user key or app token not configured', AlertErrorType.CONFIGURATION_ERROR);
    }

    const post = () => this.post(message);
    if (!this.config.retry) {
      return post();
    }

    const handler = new NotificationErrorHandler({ operation: 'send', module: 'notification.pushover' }, this.logger);
    return handler.handle(post, this.config.retry);
  }

  private async post(message: NotificationMessage): Promise<{ messageId?: string }> {
    const form = new URLSearchParams({
      token: this.config.appToken,
      user: this.config.userKey,
      message: message.content,
      title: message.title,
      priority: String(PUSHOVER_PRIORITIES[message.priority ?? 'medium'])
    });

    try {
      const response = await this.http.post<unknown>(this.config.apiUrl ?? PUSHOVER_API_URL, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
      });

      const body = response.data;
      if (!isRecord(body) || body.status !== 1) {
        throw new AlertError(`Pushover did not accept the message: ${JSON.stringify(body)}`, AlertErrorType.NOTIFICATION_ERROR, {
          operation: 'send',
          details: { status: response.status }
        });
      }

      this.logger.info('Notification sent successfully', undefined, 'send');
      return { messageId: typeof body.request === 'string' ? body.request : undefined };
    } catch (error) {
      throw this.toAlertError(error);
    }
  }

  private toAlertError(error: unknown): AlertError {
    if (error instanceof AlertError) {
      return error;
    }
    if (!isAxiosError(error)) {
      return new AlertError(toError(error).message, AlertErrorType.UNKNOWN_ERROR, { operation: 'send', cause: error });
    }

    const status = error.response?.status;
    if (status === undefined) {
      return new AlertError(`Failed to send notification: ${error.message}`, AlertErrorType.NETWORK_ERROR, {
        operation: 'send',
        cause: error
      });
    }

    const data: unknown = error.response?.data;
    const reasons = isRecord(data) && Array.isArray(data.errors) ? data.errors.filter((reason): reason is string => typeof reason === 'string') : [];
    const suffix = reasons.length > 0 ? `: ${reasons.join('; ')}` : '';
    return new AlertError(`Failed to send notification. Status: ${status}${suffix}`, status >= 500 ? AlertErrorType.SERVER_ERROR : AlertErrorType.NOTIFICATION_ERROR, {
      operation: 'send',
      cause: error,
      details: { status }
    });
  }
}

export interface WebhookConfig {
  url: string;
  timeout?: number;
}

/**
 * Webhook notification adapter: POSTs the message as JSON.
 */
export class WebhookNotificationAdapter extends BaseNotificationAdapter {
  readonly name = 'webhook';

  private readonly config: WebhookConfig;
  private readonly http: AxiosInstance;

  constructor(config: WebhookConfig) {
    super();
    this.config = config;
    this.http = axios.create({ timeout: config.timeout ?? 10000 });
  }

  async isAvailable(): Promise<boolean> {
    return Boolean(this.config.url);
  }

  protected async doSend(message: NotificationMessage): Promise<{ messageId?: string }> {
    if (!this.config.url) {
      throw new AlertError('Webhook URL not configured', AlertErrorType.CONFIGURATION_ERROR);
    }

    try {
      await this.http.post(this.config.url, {
        title: message.title,
        content: message.content,
        priority: message.priority ?? 'medium',
        metadata: message.metadata ?? {},
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      throw new AlertError(
        status !== undefined ? `Webhook responded with status ${status}` : `Webhook request failed: ${toError(error).message}`,
        AlertErrorType.NOTIFICATION_ERROR,
        { operation: 'send', cause: error, details: { status } }
      );
    }

    return { messageId: `webhook_${Date.now()}` };
  }
}

/**
 * Notification Manager for multi-channel support
 */
export class NotificationManager {
  private readonly adapters: NotificationAdapter[];
  private readonly history: NotificationHistory = new NotificationHistory();
  private readonly logger: Logger;

  constructor(adapters: NotificationAdapter[] = [], logger?: Logger) {
    this.adapters = [...adapters];
    this.logger = logger ?? createLogger('notification');
  }

  addAdapter(adapter: NotificationAdapter): void {
    this.adapters.push(adapter);
  }

  getAdapters(): NotificationAdapter[] {
    return [...this.adapters];
  }

  /**
   * Send through the adapters in order. Stops after the first success
   * unless the priority is critical.
   */
  async send(message: NotificationMessage): Promise<NotificationResult[]> {
    const results: NotificationResult[] = [];

    for (const adapter of this.adapters) {
      const result = await this.sendThrough(adapter, message);
      results.push(result);
      this.history.record(result);

      if (result.success) {
        if (message.priority !== 'critical') {
          break;
        }
      } else {
        this.logger.warn(`Channel ${result.channel} failed: ${result.error}`, undefined, 'send');
      }
    }

    return results;
  }

  async getAvailableAdapters(): Promise<string[]> {
    const available: string[] = [];

    for (const adapter of this.adapters) {
      if (await adapter.isAvailable()) {
        available.push(adapter.name);
      }
    }

    return available;
  }

  getHistory(limit?: number): NotificationResult[] {
    return this.history.getHistory(limit);
  }

  getHistoryByChannel(channel: string, limit?: number): NotificationResult[] {
    return this.history.getHistoryByChannel(channel, limit);
  }

  getSuccessRate(channel?: string): number {
    return this.history.getSuccessRate(channel);
  }

  clearHistory(): void {
    this.history.clear();
  }

  private async sendThrough(adapter: NotificationAdapter, message: NotificationMessage): Promise<NotificationResult> {
    try {
      if (!(await adapter.isAvailable())) {
        return {
          success: false,
          channel: adapter.name,
          error: 'Adapter not available',
          timestamp: new Date()
        };
      }

      return await adapter.send(message);
    } catch (error) {
      return {
        success: false,
        channel: adapter.name,
        error: error instanceof Error ? error.message : 'Adapter error',
        timestamp: new Date()
      };
    }
  }
}
