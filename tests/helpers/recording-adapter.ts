import { BaseNotificationAdapter, NotificationMessage } from '../../src/system/notification';

/**
 * Notification adapter that keeps what it was asked to send.
 */
export class RecordingAdapter extends BaseNotificationAdapter {
  readonly name: string;
  readonly sent: NotificationMessage[] = [];
  failWith: string | null = null;
  available = true;

  constructor(name: string = 'recording') {
    super();
    this.name = name;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  protected async doSend(message: NotificationMessage): Promise<{ messageId?: string }> {
    if (this.failWith) {
      throw new Error(this.failWith);
    }
    this.sent.push(message);
    return { messageId: `${this.name}-${this.sent.length}` };
  }
}
