/**
 * Type definition for Fan Controller configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { BlowerMode } from './common';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for timing, speeds, devices, and logging
 */
export interface FanControlUserConfig {
  // ───────── LOOP ─────────
  readonly POLL_PERIOD_MS: number;
  readonly HTTP_TIMEOUT_MS: number;

  // ───────── FURNACE BLOWER ─────────
  readonly BLOWER_TAIL_SEC: number;

  // ───────── CEILING FANS ─────────
  readonly FAN_ON_DELAY_SEC: number;
  readonly FAN_OFF_DELAY_SEC: number;
  readonly HEAT_ON_FAN_SPEED: number;
  readonly HEAT_OFF_FAN_SPEED: number;

  // ───────── DEVICES ─────────
  readonly THERMOSTAT_URL: string;
  readonly CEILING_FAN_URLS: readonly string[];

  // ───────── LOGGING ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Protocol and engine constants that should rarely change
 */
export interface FanControlAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── FAILURE REPORTING ─────────
  readonly FAILURE_REPORT_INTERVAL: number;

  // ───────── PROTOCOL CONSTANTS ─────────
  readonly HTTP_OK: number;
  readonly BLOWER_MODE_CODES: Readonly<Record<BlowerMode, number>>;
  readonly HEAT_ACTIVE_TSTATE: number;

  // ───────── VALIDATION CONSTANTS ─────────
  readonly MAX_FAN_SPEED: number;
}

/**
 * Complete Fan Controller configuration
 * Combines user config and app constants
 */
export type FanControlConfig = FanControlUserConfig & FanControlAppConstants;
