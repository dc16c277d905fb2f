import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

export type EnvSource = Record<string, string | undefined>;

/**
 * Environment variable loader
 */
export class EnvLoader {
  private static initialized = false;

  private readonly source: EnvSource;

  constructor(source: EnvSource = process.env) {
    this.source = source;
  }

  /**
   * Load `.env.local` and `.env` from the working directory into
   * process.env. Variables that are already set are left alone. Returns the
   * files that were loaded.
   */
  static initialize(cwd: string = process.cwd()): string[] {
    if (this.initialized) {
      return [];
    }

    const loaded: string[] = [];
    for (const file of ['.env.local', '.env']) {
      const envPath = path.join(cwd, file);
      if (!fs.existsSync(envPath)) {
        continue;
      }
      const result = dotenv.config({ path: envPath });
      if (result.error) {
        throw new Error(`Failed to load environment file ${envPath}: ${result.error.message}`);
      }
      loaded.push(envPath);
    }

    this.initialized = true;
    return loaded;
  }

  /**
   * Empty strings count as unset.
   */
  get(key: string, defaultValue?: string): string | undefined {
    const value = this.source[key];
    return value !== undefined && value.trim() !== '' ? value.trim() : defaultValue;
  }

  getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = Number(value);
    return Number.isFinite(num) ? num : defaultValue;
  }

  getBoolean(key: string, defaultValue?: boolean): boolean | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const lowerValue = value.toLowerCase();
    return lowerValue === 'true' || lowerValue === '1' || lowerValue === 'yes';
  }
}
