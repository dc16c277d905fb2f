#!/usr/bin/env node

/**
 * weather-alert command line
 */

import { Command } from 'commander';
import { Table } from 'console-table-printer';
import chalk from 'chalk';
import { AppConfig, ConfigManager, EnvLoader, EnvSource } from '../system/config';
import { toError } from '../system/error-handling';
import { configureLogging, createLogger } from '../system/logger';
import { WeatherAlertSystem } from '../system/system';
import { Severity, WeatherCondition } from '../weather/types';

export interface CliDeps {
  env?: EnvSource;
  /** Load .env files into process.env before reading configuration */
  loadEnvFiles?: boolean;
  createSystem?: (config: AppConfig) => WeatherAlertSystem;
  /** Resolves when the long-running process should shut down */
  waitForShutdown?: () => Promise<void>;
  /** Leave the logger configuration alone */
  skipLoggingSetup?: boolean;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

interface GlobalOptions {
  config?: string;
}

interface StartOptions {
  location?: string;
  threshold?: string;
  schedule?: string;
  initialCheck: boolean;
}

interface CheckOptions {
  dryRun?: boolean;
}

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  info: chalk.cyan,
  warning: chalk.yellow,
  severe: chalk.red,
  extreme: chalk.bgRed.white
};

const logger = createLogger('cli');

export function waitForSignal(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): Promise<void> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals) => {
      for (const name of signals) {
        process.off(name, onSignal);
      }
      logger.info(`Received ${signal}, shutting down`);
      resolve();
    };
    for (const signal of signals) {
      process.on(signal, onSignal);
    }
  });
}

export function printConditionTable(conditions: WeatherCondition[], out: (line: string) => void): void {
  const table = new Table({
    columns: [
      { name: 'time', title: 'Forecast (UTC)', alignment: 'left' },
      { name: 'type', title: 'Type', alignment: 'left' },
      { name: 'severity', title: 'Severity', alignment: 'left' },
      { name: 'description', title: 'Description', alignment: 'left' },
      { name: 'value', title: 'Value', alignment: 'right' }
    ]
  });

  for (const condition of conditions) {
    table.addRow({
      time: condition.forecastTime ? condition.forecastTime.toISOString().slice(0, 16).replace('T', ' ') : '-',
      type: condition.type,
      severity: SEVERITY_COLORS[condition.severity](condition.severity),
      description: condition.description,
      value: condition.unit ? `${condition.value}${condition.unit}` : '-'
    });
  }

  out(table.render());
}

export function createProgram(deps: CliDeps = {}): Command {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const createSystem = deps.createSystem ?? WeatherAlertSystem.fromConfig;
  const waitForShutdown = deps.waitForShutdown ?? (() => waitForSignal());

  const program = new Command();

  const loadConfig = (options: { fileLogging: boolean }): ConfigManager => {
    if (deps.loadEnvFiles ?? true) {
      EnvLoader.initialize();
    }
    const globals: GlobalOptions = program.opts();
    const manager = new ConfigManager({ env: deps.env, configPath: globals.config });

    if (!deps.skipLoggingSetup) {
      const { level, file } = manager.getConfig().logging;
      configureLogging({
        minLevel: level,
        fileOutput: options.fileLogging && file !== null,
        filePath: file ?? undefined
      });
    }

    return manager;
  };

  const reportConfigErrors = (errors: string[]): boolean => {
    if (errors.length === 0) {
      return false;
    }
    err(chalk.red('✗ Invalid configuration:'));
    for (const message of errors) {
      err(`  - ${message}`);
    }
    process.exitCode = 1;
    return true;
  };

  program
    .name('weather-alert')
    .description('Monitor the weather forecast and push alerts for dangerous conditions')
    .version('0.1.0')
    .option('-c, --config <path>', 'YAML configuration file');

  program
    .command('start', { isDefault: true })
    .description('Run the scheduled weather checks until interrupted')
    .option('-l, --location <location>', 'location to monitor, e.g. "Berlin,DE"')
    .option('-t, --threshold <severity>', 'minimum severity to notify (info|warning|severe|extreme)')
    .option('-s, --schedule <cron>', 'cron expression for the check')
    .option('--no-initial-check', 'do not check immediately on start')
    .action(async (options: StartOptions) => {
      const manager = loadConfig({ fileLogging: true });
      manager.applyOverrides({
        location: options.location,
        threshold: options.threshold,
        schedule: options.schedule,
        runOnStart: options.initialCheck ? undefined : false
      });
      if (reportConfigErrors(manager.validate())) {
        return;
      }

      const system = createSystem(manager.getConfig());
      try {
        await system.start();
      } catch (error) {
        const startError = toError(error);
        logger.fatal('Failed to start Weather Alert System', startError);
        err(chalk.red(`✗ ${startError.message}`));
        process.exitCode = 1;
        return;
      }

      await waitForShutdown();
      await system.stop();
    });

  program
    .command('check')
    .description('Run a single weather check')
    .option('--dry-run', 'print the conditions and message without sending')
    .action(async (options: CheckOptions) => {
      const manager = loadConfig({ fileLogging: false });
      if (reportConfigErrors(manager.validate())) {
        return;
      }
      const system = createSystem(manager.getConfig());

      if (!options.dryRun) {
        const result = await system.checkWeather();
        if (result.error) {
          err(chalk.red(`✗ Weather check failed: ${result.error}`));
          process.exitCode = 1;
          return;
        }
        out(
          chalk.green(
            `✓ Found ${result.conditions.length} condition(s); notification ${result.notified ? 'sent' : 'not sent'}`
          )
        );
        return;
      }

      const forecast = await system.weatherService.fetchForecast();
      if (!forecast) {
        err(chalk.red('✗ Weather data unavailable'));
        process.exitCode = 1;
        return;
      }

      const conditions = system.weatherService.analyzeForecast(forecast);
      if (conditions.length === 0) {
        out(chalk.green(`No conditions detected for ${system.weatherService.getLocation()}`));
        return;
      }

      printConditionTable(conditions, out);

      const selected = system.alertSystem.selectConditions(conditions);
      if (selected.length === 0) {
        out(chalk.yellow(`No conditions meet the '${system.alertSystem.getNotificationThreshold()}' threshold`));
        return;
      }
      out(chalk.blue('Message that would be sent:'));
      out(system.alertSystem.formatConditionMessage(selected));
    });

  program
    .command('config')
    .description('Print the effective configuration with secrets masked')
    .action(() => {
      const manager = loadConfig({ fileLogging: false });
      out(JSON.stringify(manager.getMaskedConfig(), null, 2));
      for (const message of manager.validate()) {
        err(chalk.yellow(`! ${message}`));
      }
    });

  program
    .command('test-notification')
    .description('Send a test notification through the configured channels')
    .action(async () => {
      const manager = loadConfig({ fileLogging: false });
      const config = manager.getConfig();
      const system = createSystem(config);

      if (system.notification.getAdapters().length === 0) {
        err(chalk.red('✗ No notification channels configured'));
        process.exitCode = 1;
        return;
      }

      const results = await system.notification.send({
        title: config.notification.title,
        content: 'This is a test notification from the Weather Alert System.',
        priority: 'low'
      });

      for (const result of results) {
        if (result.success) {
          out(chalk.green(`✓ ${result.channel}`));
        } else {
          err(chalk.red(`✗ ${result.channel}: ${result.error ?? 'unknown error'}`));
        }
      }

      if (!results.some(result => result.success)) {
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      logger.fatal('Unhandled error', toError(error));
      process.exitCode = 1;
    });
}
