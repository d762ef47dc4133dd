/**
 * Controller initialization
 * Wires configuration, logging, devices and controllers; contacts no device
 */

import { createBlowerOverride, createCeilingFanSync, createThermostatTracker } from '@core';
import type { ControlledFan } from '@core';
import { createCeilingFanDevice } from '@hardware/ceiling-fan';
import { createThermostatDevice } from '@hardware/thermostat';
import { createHttpTransport } from '@hardware/transport';
import type { DeviceTransport } from '@hardware/transport';
import { createConsoleSink, createLogger } from '@logging';
import type { Logger, SinkWithLevel } from '@logging';
import { ConfigValidationError } from '$types';
import type { FanControlConfig } from '$types';
import { now, nowMs } from '@utils/time';
import { validateConfig } from '@validation';
import { buildConfig } from './env';
import type { Application, InitDependencies } from './types';

/**
 * Build the application from defaults plus environment overrides
 *
 * Fans are ordered ceiling fans first (config order), then the furnace blower.
 *
 * @param deps - Environment, console and colors
 * @returns Wired application
 * @throws ConfigValidationError when the configuration has critical issues
 */
export function initialize(deps: InitDependencies): Application {
  const config = buildConfig(deps.env);
  const consoleApi = deps.consoleApi;

  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    validation.errors.forEach(function(err) {
      consoleApi.error('  [' + err.field + ']: ' + err.message);
    });
    const fields = validation.errors.map(function(err) {
      return err.field;
    });
    throw new ConfigValidationError('Invalid configuration: ' + fields.join(', '), fields);
  }

  validation.warnings.forEach(function(warn) {
    consoleApi.log('⚠️ [WARNING]  [' + warn.field + ']: ' + warn.message);
  });

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink(consoleApi, {
      logLevels: config.LOG_LEVELS,
      colors: deps.colors,
      clock: function() {
        return new Date();
      }
    });
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: now,
    sinks: sinks
  }, config.LOG_LEVELS);

  const messages = logger.initialize();
  for (let i = 0; i < messages.length; i++) {
    if (!messages[i].success) {
      logger.warning(messages[i].message);
    }
  }

  // Devices and controllers
  function transportFor(url: string): DeviceTransport {
    return createHttpTransport({ url: url, timeoutMs: config.HTTP_TIMEOUT_MS }, deps.fetchFn);
  }

  const thermostat = createThermostatDevice(transportFor(config.THERMOSTAT_URL), nowMs);
  const tracker = createThermostatTracker(thermostat, config, { clock: nowMs, logger: logger });

  const fans: ControlledFan[] = [];
  for (let i = 0; i < config.CEILING_FAN_URLS.length; i++) {
    const device = createCeilingFanDevice(transportFor(config.CEILING_FAN_URLS[i]), nowMs);
    fans.push(createCeilingFanSync(device, config, logger));
  }
  fans.push(createBlowerOverride(thermostat, config, logger));

  return {
    config: config,
    controller: { tracker: tracker, fans: fans, logger: logger }
  };
}

/**
 * Render the startup summary lines
 */
export function describeStartup(config: FanControlConfig): string[] {
  return [
    '🚀 Furnace fan controller',
    '🌡️ ' + config.THERMOSTAT_URL + ' | ⏱️ every ' + config.POLL_PERIOD_MS + 'ms | 💨 tail ' + config.BLOWER_TAIL_SEC + 's',
    '🌀 ' + config.CEILING_FAN_URLS.length + ' fans | ON +' + config.FAN_ON_DELAY_SEC + 's → ' + config.HEAT_ON_FAN_SPEED +
      ' | OFF +' + config.FAN_OFF_DELAY_SEC + 's → ' + config.HEAT_OFF_FAN_SPEED
  ];
}

/**
 * Log the startup summary at INFO
 */
export function announceStartup(config: FanControlConfig, logger: Logger): void {
  const lines = describeStartup(config);
  for (let i = 0; i < lines.length; i++) {
    logger.info(lines[i]);
  }
}
