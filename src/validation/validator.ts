/**
 * Configuration validator
 * Run once at boot, before any device is contacted
 */

import type { FanControlConfig } from '$types';
import type { RangeRule, ValidationIssue, ValidationResult } from './types';
import { addError, addWarning, checkBoolean, checkHttpUrl, checkIntegerRange, checkRange, findDuplicates } from './helpers';

export const RANGES = {
  POLL_PERIOD_MS: { min: 1000, max: 300000, recommendedMin: 5000, recommendedMax: 60000 },
  HTTP_TIMEOUT_MS: { min: 500, max: 60000, recommendedMin: 2000, recommendedMax: 15000 },
  BLOWER_TAIL_SEC: { min: 1, max: 3600, recommendedMin: 120, recommendedMax: 600 },
  FAN_ON_DELAY_SEC: { min: 0, max: 3600, recommendedMin: 30, recommendedMax: 120 },
  FAN_OFF_DELAY_SEC: { min: 0, max: 7200, recommendedMin: 120, recommendedMax: 600 },
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: { min: 0, max: 720 }
} satisfies Record<string, RangeRule>;

/**
 * Validate the merged configuration
 *
 * @param config - Configuration to check
 * @returns Every critical issue and warning found
 */
export function validateConfig(config: FanControlConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // Loop timing
  const pollOk = checkRange(config.POLL_PERIOD_MS, 'POLL_PERIOD_MS', RANGES.POLL_PERIOD_MS, errors, warnings);
  const timeoutOk = checkRange(config.HTTP_TIMEOUT_MS, 'HTTP_TIMEOUT_MS', RANGES.HTTP_TIMEOUT_MS, errors, warnings);
  if (pollOk && timeoutOk && config.HTTP_TIMEOUT_MS >= config.POLL_PERIOD_MS) {
    addWarning(warnings, 'HTTP_TIMEOUT_MS', 'HTTP_TIMEOUT_MS should be below POLL_PERIOD_MS; a hung device will delay the next cycle');
  }

  // Blower
  const tailOk = checkRange(config.BLOWER_TAIL_SEC, 'BLOWER_TAIL_SEC', RANGES.BLOWER_TAIL_SEC, errors, warnings);

  // Ceiling fan delays
  const onOk = checkRange(config.FAN_ON_DELAY_SEC, 'FAN_ON_DELAY_SEC', RANGES.FAN_ON_DELAY_SEC, errors, warnings);
  const offOk = checkRange(config.FAN_OFF_DELAY_SEC, 'FAN_OFF_DELAY_SEC', RANGES.FAN_OFF_DELAY_SEC, errors, warnings);
  if (onOk && offOk && config.FAN_OFF_DELAY_SEC <= config.FAN_ON_DELAY_SEC) {
    addError(errors, 'FAN_OFF_DELAY_SEC', 'FAN_OFF_DELAY_SEC must be greater than FAN_ON_DELAY_SEC');
  }
  // Before the first transition the time since transition reads as BLOWER_TAIL_SEC
  if (tailOk && offOk && config.FAN_OFF_DELAY_SEC >= config.BLOWER_TAIL_SEC) {
    addWarning(
      warnings,
      'FAN_OFF_DELAY_SEC',
      'FAN_OFF_DELAY_SEC is not below BLOWER_TAIL_SEC; ceiling fans are not set at start-up until the heat call changes'
    );
  }

  // Ceiling fan speeds
  const speedRule: RangeRule = { min: 0, max: config.MAX_FAN_SPEED };
  const heatOnOk = checkIntegerRange(config.HEAT_ON_FAN_SPEED, 'HEAT_ON_FAN_SPEED', speedRule, errors, warnings);
  const heatOffOk = checkIntegerRange(config.HEAT_OFF_FAN_SPEED, 'HEAT_OFF_FAN_SPEED', speedRule, errors, warnings);
  if (heatOnOk && heatOffOk && config.HEAT_ON_FAN_SPEED <= config.HEAT_OFF_FAN_SPEED) {
    addWarning(warnings, 'HEAT_ON_FAN_SPEED', 'HEAT_ON_FAN_SPEED is not above HEAT_OFF_FAN_SPEED; fans will not speed up while heating');
  }

  // Devices
  checkHttpUrl(config.THERMOSTAT_URL, 'THERMOSTAT_URL', errors);
  if (config.CEILING_FAN_URLS.length === 0) {
    addWarning(warnings, 'CEILING_FAN_URLS', 'No ceiling fans configured; only the blower will be controlled');
  }
  for (let i = 0; i < config.CEILING_FAN_URLS.length; i++) {
    checkHttpUrl(config.CEILING_FAN_URLS[i], 'CEILING_FAN_URLS[' + i + ']', errors);
  }
  const duplicates = findDuplicates(config.CEILING_FAN_URLS);
  if (duplicates.length > 0) {
    addError(errors, 'CEILING_FAN_URLS', 'CEILING_FAN_URLS contains duplicates: ' + duplicates.join(', '));
  }

  // Logging
  checkBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  const levelRule: RangeRule = { min: config.LOG_LEVELS.DEBUG, max: config.LOG_LEVELS.CRITICAL };
  checkIntegerRange(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', levelRule, errors, warnings);
  checkIntegerRange(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', levelRule, errors, warnings);
  checkRange(config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', RANGES.GLOBAL_LOG_AUTO_DEMOTE_HOURS, errors, warnings);

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
