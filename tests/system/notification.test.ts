import {
  NotificationHistory,
  NotificationManager,
  PushoverNotificationAdapter,
  WebhookNotificationAdapter,
  truncate
} from '../../src/system/notification';
import { StubResponse, TestServer, silentLogger, startTestServer } from '../helpers/http-server';
import { RecordingAdapter } from '../helpers/recording-adapter';

describe('truncate', () => {
  it('should leave short text alone', () => {
    expect(truncate('hello', 5)).toBe('hello');
  });

  it('should cut long text with an ellipsis', () => {
    expect(truncate('hello world', 6)).toBe('hello…');
  });
});

describe('Notification History', () => {
  let history: NotificationHistory;

  beforeEach(() => {
    history = new NotificationHistory();
  });

  it('should list the newest result first', () => {
    const first = { success: true, channel: 'pushover', timestamp: new Date('2024-07-01T09:00:00Z') };
    const second = { success: false, channel: 'webhook', timestamp: new Date('2024-07-01T10:00:00Z') };
    history.record(first);
    history.record(second);

    expect(history.getHistory()).toEqual([second, first]);
    expect(history.getHistory(1)).toEqual([second]);
  });

  it('should get history by channel', () => {
    history.record({ success: true, channel: 'pushover', timestamp: new Date() });
    history.record({ success: false, channel: 'webhook', timestamp: new Date() });
    history.record({ success: true, channel: 'pushover', timestamp: new Date() });

    expect(history.getHistoryByChannel('pushover')).toHaveLength(2);
    expect(history.getHistoryByChannel('webhook')).toHaveLength(1);
  });

  it('should calculate success rate', () => {
    history.record({ success: true, channel: 'pushover', timestamp: new Date() });
    history.record({ success: true, channel: 'pushover', timestamp: new Date() });
    history.record({ success: false, channel: 'pushover', timestamp: new Date() });
    history.record({ success: false, channel: 'webhook', timestamp: new Date() });

    expect(history.getSuccessRate('pushover')).toBeCloseTo(66.67, 1);
    expect(history.getSuccessRate()).toBe(50);
    expect(history.getSuccessRate('email')).toBe(100);
  });

  it('should drop the oldest entries past the limit', () => {
    const small = new NotificationHistory(2);
    small.record({ success: true, channel: 'a', timestamp: new Date('2024-07-01T09:00:00Z') });
    small.record({ success: true, channel: 'b', timestamp: new Date('2024-07-01T10:00:00Z') });
    small.record({ success: true, channel: 'c', timestamp: new Date('2024-07-01T11:00:00Z') });

    expect(small.getHistory().map(result => result.channel)).toEqual(['c', 'b']);
  });
});

describe('PushoverNotificationAdapter', () => {
  let server: TestServer;
  let replies: StubResponse[];

  beforeEach(async () => {
    replies = [{ status: 200, body: { status: 1, request: 'req-1' } }];
    server = await startTestServer(() => replies.shift() ?? { status: 200, body: { status: 1, request: 'req-n' } });
  });

  afterEach(async () => {
    await server.close();
  });

  function pushover(extra: { retry?: { maxAttempts: number; baseDelay: number; minDelay: number; maxDelay: number } } = {}) {
    return new PushoverNotificationAdapter(
      { userKey: 'test-user', appToken: 'test-token', apiUrl: `${server.url}/1/messages.json`, ...extra },
      silentLogger()
    );
  }

  it('should post the message as a form', async () => {
    const result = await pushover().send({ title: 'Weather Alert System', content: 'Storm coming', priority: 'high' });

    expect(result.success).toBe(true);
    expect(result.channel).toBe('pushover');
    expect(result.messageId).toBe('req-1');

    const request = server.requests[0];
    expect(request.method).toBe('POST');
    expect(request.url).toBe('/1/messages.json');
    expect(request.headers['content-type']).toBe('application/x-www-form-urlencoded');
    const form = new URLSearchParams(request.body);
    expect(form.get('token')).toBe('test-token');
    expect(form.get('user')).toBe('test-user');
    expect(form.get('title')).toBe('Weather Alert System');
    expect(form.get('message')).toBe('Storm coming');
    expect(form.get('priority')).toBe('1');
  });

  it('should map priorities', async () => {
    const adapter = pushover();
    await adapter.send({ title: 't', content: 'low', priority: 'low' });
    await adapter.send({ title: 't', content: 'default' });
    await adapter.send({ title: 't', content: 'critical', priority: 'critical' });

    expect(server.requests.map(request => new URLSearchParams(request.body).get('priority'))).toEqual(['-1', '0', '1']);
  });

  it('should truncate long messages', async () => {
    await pushover().send({ title: 'Weather Alert System', content: 'x'.repeat(2000) });

    const message = new URLSearchParams(server.requests[0].body).get('message');
    expect(message).toHaveLength(1024);
    expect(message?.endsWith('…')).toBe(true);
  });

  it('should report the status and reasons of a rejected request', async () => {
    replies = [{ status: 400, body: { status: 0, errors: ['user identifier is invalid'] } }];

    const result = await pushover().send({ title: 't', content: 'c' });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Failed to send notification. Status: 400: user identifier is invalid');
  });

  it('should require status 1 in the response', async () => {
    replies = [{ status: 200, body: { status: 0 } }];

    const result = await pushover().send({ title: 't', content: 'c' });

    expect(result.error).toBe('Pushover did not accept the message: {"status":0}');
  });

  it('should retry server errors when retry is configured', async () => {
    replies = [
      { status: 500, body: {} },
      { status: 200, body: { status: 1, request: 'req-2' } }
    ];

    const result = await pushover({ retry: { maxAttempts: 3, baseDelay: 1, minDelay: 1, maxDelay: 5 } }).send({
      title: 't',
      content: 'c'
    });

    expect(result.success).toBe(true);
    expect(result.messageId).toBe('req-2');
    expect(server.requests).toHaveLength(2);
  });

  it('should give up after the last retry', async () => {
    replies = [
      { status: 500, body: {} },
      { status: 502, body: {} }
    ];

    const result = await pushover({ retry: { maxAttempts: 2, baseDelay: 1, minDelay: 1, maxDelay: 5 } }).send({
      title: 't',
      content: 'c'
    });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Failed to send notification. Status: 502');
    expect(server.requests).toHaveLength(2);
  });

  it('should not retry rejected requests', async () => {
    replies = [{ status: 400, body: { status: 0 } }];

    await pushover({ retry: { maxAttempts: 3, baseDelay: 1, minDelay: 1, maxDelay: 5 } }).send({ title: 't', content: 'c' });

    expect(server.requests).toHaveLength(1);
  });

  it('should be unavailable without credentials', async () => {
    const adapter = new PushoverNotificationAdapter({ userKey: '', appToken: 'test-token' }, silentLogger());

    await expect(adapter.isAvailable()).resolves.toBe(false);
  });
});

describe('WebhookNotificationAdapter', () => {
  let server: TestServer;
  let status: number;

  beforeEach(async () => {
    status = 200;
    server = await startTestServer(() => ({ status, body: { ok: status === 200 } }));
  });

  afterEach(async () => {
    await server.close();
  });

  it('should post the message as JSON', async () => {
    const adapter = new WebhookNotificationAdapter({ url: `${server.url}/hooks/weather` });

    const result = await adapter.send({
      title: 'Weather Alert System',
      content: 'Storm coming',
      priority: 'high',
      metadata: { location: 'London,UK' }
    });

    expect(result.success).toBe(true);
    expect(server.requests[0].url).toBe('/hooks/weather');
    expect(JSON.parse(server.requests[0].body)).toMatchObject({
      title: 'Weather Alert System',
      content: 'Storm coming',
      priority: 'high',
      metadata: { location: 'London,UK' }
    });
  });

  it('should report error statuses', async () => {
    status = 503;
    const adapter = new WebhookNotificationAdapter({ url: `${server.url}/hooks/weather` });

    const result = await adapter.send({ title: 't', content: 'c' });

    expect(result.success).toBe(false);
    expect(result.error).toBe('Webhook responded with status 503');
  });
});

describe('NotificationManager', () => {
  let primary: RecordingAdapter;
  let backup: RecordingAdapter;
  let manager: NotificationManager;

  beforeEach(() => {
    primary = new RecordingAdapter('primary');
    backup = new RecordingAdapter('backup');
    manager = new NotificationManager([primary, backup], silentLogger());
  });

  it('should stop after the first successful channel', async () => {
    const results = await manager.send({ title: 't', content: 'c', priority: 'high' });

    expect(results.map(result => result.channel)).toEqual(['primary']);
    expect(backup.sent).toHaveLength(0);
  });

  it('should fall back to the next channel', async () => {
    primary.failWith = 'down';

    const results = await manager.send({ title: 't', content: 'c' });

    expect(results.map(result => [result.channel, result.success])).toEqual([
      ['primary', false],
      ['backup', true]
    ]);
  });

  it('should use every channel for critical messages', async () => {
    await manager.send({ title: 't', content: 'c', priority: 'critical' });

    expect(primary.sent).toHaveLength(1);
    expect(backup.sent).toHaveLength(1);
  });

  it('should skip unavailable channels', async () => {
    primary.available = false;

    const results = await manager.send({ title: 't', content: 'c' });

    expect(results[0]).toMatchObject({ channel: 'primary', success: false, error: 'Adapter not available' });
    expect(results[1]).toMatchObject({ channel: 'backup', success: true });
    await expect(manager.getAvailableAdapters()).resolves.toEqual(['backup']);
  });

  it('should reject messages without content', async () => {
    const results = await manager.send({ title: 't', content: '' });

    expect(results[0].error).toBe('Notification title and content are required');
  });

  it('should keep delivery history', async () => {
    primary.failWith = 'down';
    await manager.send({ title: 't', content: 'c' });

    expect(manager.getHistory()).toHaveLength(2);
    expect(manager.getHistoryByChannel('primary')).toHaveLength(1);
    expect(manager.getSuccessRate()).toBe(50);

    manager.clearHistory();
    expect(manager.getHistory()).toHaveLength(0);
  });
});
