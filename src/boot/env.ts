/**
 * Environment overrides for device endpoints
 *
 * FANCTL_THERMOSTAT_URL      Thermostat state endpoint
 * FANCTL_CEILING_FAN_URLS    Comma-separated ceiling fan endpoints, in control order
 */

import type { FanControlConfig } from '$types';
import CONFIG from './config';
import type { DeviceEndpoints, Environment } from './types';

export const ENV_KEYS = {
  THERMOSTAT_URL: 'FANCTL_THERMOSTAT_URL',
  CEILING_FAN_URLS: 'FANCTL_CEILING_FAN_URLS'
} as const;

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseUrlList(value: string): string[] {
  const urls: string[] = [];
  const parts = value.split(',');
  for (let i = 0; i < parts.length; i++) {
    const url = parts[i].trim();
    if (url.length > 0) {
      urls.push(url);
    }
  }
  return urls;
}

/**
 * Read endpoint overrides; unset or blank variables are ignored
 */
export function loadDeviceEndpoints(env: Environment): DeviceEndpoints {
  const endpoints: DeviceEndpoints = {};

  const thermostat = env[ENV_KEYS.THERMOSTAT_URL];
  if (thermostat !== undefined && thermostat.trim().length > 0) {
    endpoints.THERMOSTAT_URL = thermostat.trim();
  }

  const fans = env[ENV_KEYS.CEILING_FAN_URLS];
  if (fans !== undefined && fans.trim().length > 0) {
    endpoints.CEILING_FAN_URLS = parseUrlList(fans);
  }

  return endpoints;
}

/**
 * Default configuration with environment overrides applied
 */
export function buildConfig(env: Environment): FanControlConfig {
  return Object.freeze({ ...CONFIG, ...loadDeviceEndpoints(env) });
}
