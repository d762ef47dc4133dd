import type { ChalkInstance } from 'chalk';
import type { FanControlConfig } from '$types';
import type { ConsoleAPI } from '@logging';
import type { FetchFn } from '@hardware/transport';
import type { Controller } from '@system/control';

/**
 * Environment variables the controller reads
 */
export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Device endpoint overrides taken from the environment
 */
export interface DeviceEndpoints {
  THERMOSTAT_URL?: string;
  CEILING_FAN_URLS?: string[];
}

/**
 * External dependencies for initialization
 */
export interface InitDependencies {
  env: Environment;
  consoleApi: ConsoleAPI;
  colors: ChalkInstance;
  /** Defaults to the global fetch */
  fetchFn?: FetchFn;
}

/**
 * Fully wired application
 */
export interface Application {
  config: FanControlConfig;
  controller: Controller;
}

export type RunMode = 'control' | 'diagnostics';

// Re-export Controller from control module
export type { Controller } from '@system/control';
