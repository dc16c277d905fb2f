import { AlertDeduplicator, conditionFingerprint } from '../../src/alerts/deduplicator';
import { WeatherCondition } from '../../src/weather/types';

const heat: WeatherCondition = {
  type: 'temperature',
  severity: 'extreme',
  description: 'Extreme Heat',
  value: 41,
  unit: '°C',
  forecastTime: new Date('2024-07-01T12:00:00Z')
};

describe('AlertDeduplicator', () => {
  const t0 = new Date('2024-07-01T09:00:00Z');

  it('should fingerprint by type, severity, description and slot', () => {
    expect(conditionFingerprint(heat)).toBe('temperature|extreme|Extreme Heat|2024-07-01T12:00:00.000Z');
    expect(conditionFingerprint({ ...heat, value: 42 })).toBe(conditionFingerprint(heat));
    expect(conditionFingerprint({ ...heat, forecastTime: undefined })).toBe('temperature|extreme|Extreme Heat|');
  });

  it('should pass everything through when disabled', () => {
    const dedup = new AlertDeduplicator(0);
    dedup.markNotified([heat], t0);

    expect(dedup.isEnabled()).toBe(false);
    expect(dedup.filterNew([heat], t0)).toEqual([heat]);
    expect(dedup.size()).toBe(0);
  });

  it('should suppress conditions within the cooldown', () => {
    const dedup = new AlertDeduplicator(60 * 60 * 1000);
    dedup.markNotified([heat], t0);

    expect(dedup.filterNew([heat], new Date(t0.getTime() + 30 * 60 * 1000))).toEqual([]);
  });

  it('should allow conditions again after the cooldown', () => {
    const dedup = new AlertDeduplicator(60 * 60 * 1000);
    dedup.markNotified([heat], t0);

    expect(dedup.filterNew([heat], new Date(t0.getTime() + 60 * 60 * 1000))).toEqual([heat]);
    expect(dedup.size()).toBe(0);
  });

  it('should treat other forecast slots as new', () => {
    const dedup = new AlertDeduplicator(60 * 60 * 1000);
    dedup.markNotified([heat], t0);
    const later = { ...heat, forecastTime: new Date('2024-07-01T15:00:00Z') };

    expect(dedup.filterNew([heat, later], t0)).toEqual([later]);
  });

  it('should forget everything on clear', () => {
    const dedup = new AlertDeduplicator(60 * 60 * 1000);
    dedup.markNotified([heat], t0);
    dedup.clear();

    expect(dedup.filterNew([heat], t0)).toEqual([heat]);
  });
});
