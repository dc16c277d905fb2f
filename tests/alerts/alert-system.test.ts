import { AlertSystem, formatConditionLine } from '../../src/alerts/alert-system';
import { NotificationManager } from '../../src/system/notification';
import { WeatherCondition } from '../../src/weather/types';
import { silentLogger } from '../helpers/http-server';
import { RecordingAdapter } from '../helpers/recording-adapter';

const heat: WeatherCondition = {
  type: 'temperature',
  severity: 'extreme',
  description: 'Extreme Heat',
  value: 41,
  unit: '°C',
  forecastTime: new Date('2024-07-01T12:00:00Z')
};

const wind: WeatherCondition = {
  type: 'wind',
  severity: 'warning',
  description: 'Strong Winds',
  value: 54,
  unit: 'km/h'
};

const storm: WeatherCondition = {
  type: 'weather',
  severity: 'severe',
  description: 'Severe Weather: thunderstorm',
  value: 0,
  unit: ''
};

const mild: WeatherCondition = {
  type: 'temperature',
  severity: 'info',
  description: 'Mild',
  value: 22,
  unit: '°C'
};

describe('formatConditionLine', () => {
  it('should show the icon, severity and value', () => {
    expect(formatConditionLine(wind)).toBe('💨 Warning Strong Winds: 54km/h');
  });

  it('should append the forecast slot', () => {
    expect(formatConditionLine(heat)).toBe('🌡️ Extreme Extreme Heat: 41°C (2024-07-01 12:00 UTC)');
  });

  it('should omit the value for weather conditions', () => {
    expect(formatConditionLine(storm)).toBe('⚡ Severe Severe Weather: thunderstorm');
  });
});

describe('AlertSystem', () => {
  let adapter: RecordingAdapter;
  let manager: NotificationManager;
  let now: Date;

  function createAlertSystem(options: { cooldownMs?: number; threshold?: 'info' | 'warning' | 'severe' | 'extreme' } = {}) {
    return new AlertSystem(manager, {
      location: 'London,UK',
      notificationThreshold: options.threshold,
      cooldownMs: options.cooldownMs,
      logger: silentLogger(),
      now: () => now
    });
  }

  beforeEach(() => {
    adapter = new RecordingAdapter();
    manager = new NotificationManager([adapter], silentLogger());
    now = new Date('2024-07-01T09:00:00Z');
  });

  it('should default to the warning threshold', () => {
    const alerts = createAlertSystem();

    expect(alerts.getNotificationThreshold()).toBe('warning');
    expect(alerts.filterConditions([mild, wind, heat])).toEqual([wind, heat]);
  });

  it('should honour a higher threshold', () => {
    const alerts = createAlertSystem({ threshold: 'severe' });

    expect(alerts.filterConditions([mild, wind, storm, heat])).toEqual([storm, heat]);
  });

  it('should format the alert message', () => {
    const alerts = createAlertSystem();

    expect(alerts.formatConditionMessage([heat, storm])).toBe(
      [
        '⚠️ Weather Alert for London,UK:',
        '',
        '🌡️ Extreme Extreme Heat: 41°C (2024-07-01 12:00 UTC)',
        '⚡ Severe Severe Weather: thunderstorm'
      ].join('\n')
    );
  });

  it('should use a generic header without a location', () => {
    const alerts = new AlertSystem(manager, { logger: silentLogger() });

    expect(alerts.formatConditionMessage([wind])).toBe('⚠️ Weather Alert:\n\n💨 Warning Strong Winds: 54km/h');
  });

  it('should format an empty message', () => {
    expect(createAlertSystem().formatConditionMessage([])).toBe('No significant weather conditions detected.');
  });

  it('should map the highest severity to a priority', () => {
    const alerts = createAlertSystem();

    expect(alerts.getPriority([wind])).toBe('medium');
    expect(alerts.getPriority([wind, storm])).toBe('high');
    expect(alerts.getPriority([storm, heat])).toBe('critical');
    expect(alerts.getPriority([mild])).toBe('low');
  });

  it('should send qualifying conditions', async () => {
    const alerts = createAlertSystem();

    const sent = await alerts.sendNotification([mild, wind, storm]);

    expect(sent).toBe(true);
    expect(adapter.sent).toEqual([
      {
        title: 'Weather Alert System',
        content: '⚠️ Weather Alert for London,UK:\n\n💨 Warning Strong Winds: 54km/h\n⚡ Severe Severe Weather: thunderstorm',
        priority: 'high',
        metadata: { location: 'London,UK', conditionCount: 2 }
      }
    ]);
  });

  it('should use a custom title', async () => {
    await createAlertSystem().sendNotification([wind], 'Storm watch');

    expect(adapter.sent[0].title).toBe('Storm watch');
  });

  it('should not send when nothing meets the threshold', async () => {
    const alerts = createAlertSystem();

    const dispatch = await alerts.dispatch([mild]);

    expect(dispatch).toEqual({ sent: false, conditions: [], results: [] });
    expect(adapter.sent).toHaveLength(0);
  });

  it('should report a failed delivery', async () => {
    adapter.failWith = 'Failed to send notification. Status: 400';
    const alerts = createAlertSystem();

    const dispatch = await alerts.dispatch([wind]);

    expect(dispatch.sent).toBe(false);
    expect(dispatch.conditions).toEqual([wind]);
    expect(dispatch.results).toHaveLength(1);
    expect(dispatch.results[0].error).toBe('Failed to send notification. Status: 400');
  });

  it('should report failure without channels', async () => {
    manager = new NotificationManager([], silentLogger());

    await expect(createAlertSystem().sendNotification([wind])).resolves.toBe(false);
  });

  it('should suppress repeats within the cooldown', async () => {
    const alerts = createAlertSystem({ cooldownMs: 60 * 60 * 1000 });

    await expect(alerts.sendNotification([wind])).resolves.toBe(true);
    now = new Date('2024-07-01T09:30:00Z');
    await expect(alerts.sendNotification([wind])).resolves.toBe(false);
    expect(alerts.selectConditions([wind, storm])).toEqual([storm]);

    now = new Date('2024-07-01T10:00:00Z');
    await expect(alerts.sendNotification([wind])).resolves.toBe(true);
    expect(adapter.sent).toHaveLength(2);
  });

  it('should not start the cooldown when delivery fails', async () => {
    const alerts = createAlertSystem({ cooldownMs: 60 * 60 * 1000 });
    adapter.failWith = 'boom';

    await expect(alerts.sendNotification([wind])).resolves.toBe(false);

    adapter.failWith = null;
    await expect(alerts.sendNotification([wind])).resolves.toBe(true);
  });
});
