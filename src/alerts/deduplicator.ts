import { WeatherCondition } from '../weather/types';

/**
 * Identity of a condition for repeat suppression. Conditions from different
 * forecast slots are distinct.
 */
export function conditionFingerprint(condition: WeatherCondition): string {
  const slot = condition.forecastTime ? condition.forecastTime.toISOString() : '';
  return [condition.type, condition.severity, condition.description, slot].join('|');
}

/**
 * Suppresses conditions that were already notified within the cooldown.
 */
export class AlertDeduplicator {
  private readonly cooldownMs: number;
  private readonly notifiedAt: Map<string, number> = new Map();

  constructor(cooldownMs: number) {
    this.cooldownMs = Math.max(0, cooldownMs);
  }

  isEnabled(): boolean {
    return this.cooldownMs > 0;
  }

  filterNew(conditions: WeatherCondition[], now: Date = new Date()): WeatherCondition[] {
    if (!this.isEnabled()) {
      return conditions;
    }

    this.prune(now);
    return conditions.filter(condition => !this.notifiedAt.has(conditionFingerprint(condition)));
  }

  markNotified(conditions: WeatherCondition[], now: Date = new Date()): void {
    if (!this.isEnabled()) {
      return;
    }

    for (const condition of conditions) {
      this.notifiedAt.set(conditionFingerprint(condition), now.getTime());
    }
  }

  size(): number {
    return this.notifiedAt.size;
  }

  clear(): void {
    this.notifiedAt.clear();
  }

  private prune(now: Date): void {
    const cutoff = now.getTime() - this.cooldownMs;
    for (const [fingerprint, notifiedAt] of this.notifiedAt) {
      if (notifiedAt <= cutoff) {
        this.notifiedAt.delete(fingerprint);
      }
    }
  }
}
