import type { FanControlUserConfig, FanControlAppConstants, FanControlConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for timing, speeds,
//   devices, and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<FanControlUserConfig> = {
  // POLL_PERIOD_MS
  //   Role: Control loop period; one thermostat poll per period.
  //   Critical: 1000–300000 ms (error outside).
  //   Recommended: 5000–60000 ms; 15 s keeps fan reactions well inside the settle delays.
  POLL_PERIOD_MS: 15000,

  // HTTP_TIMEOUT_MS
  //   Role: Per-request timeout for every device call.
  //   Critical: 500–60000 ms (error outside).
  //   Recommended: 2000–15000 ms and below POLL_PERIOD_MS so one slow device cannot stall a full cycle.
  HTTP_TIMEOUT_MS: 10000,

  // BLOWER_TAIL_SEC
  //   Role: How long the furnace blower is forced ON after the heat call ends.
  //   Critical: 1–3600 s (error if ≤0 or >3600).
  //   Recommended: 120–600 s; 360 s pulls the residual heat out of the exchanger.
  BLOWER_TAIL_SEC: 360,

  // FAN_ON_DELAY_SEC / FAN_OFF_DELAY_SEC
  //   Role: Settle delay before ceiling fans follow a heat-on / heat-off transition.
  //   Critical:
  //     FAN_ON_DELAY_SEC: 0–3600 s.
  //     FAN_OFF_DELAY_SEC: 0–7200 s, and FAN_OFF_DELAY_SEC > FAN_ON_DELAY_SEC.
  //   Recommended: ON 30–120 s, OFF 120–600 s; 60 s / 180 s.
  FAN_ON_DELAY_SEC: 60,
  FAN_OFF_DELAY_SEC: 180,

  // HEAT_ON_FAN_SPEED / HEAT_OFF_FAN_SPEED
  //   Role: Ceiling fan speed while heating / after heating.
  //   Critical: Integer in [0, MAX_FAN_SPEED].
  //   Recommended: HEAT_ON_FAN_SPEED > HEAT_OFF_FAN_SPEED; 2 and 1.
  HEAT_ON_FAN_SPEED: 2,
  HEAT_OFF_FAN_SPEED: 1,

  // THERMOSTAT_URL
  //   Role: Thermostat state endpoint (read with GET, blower mode set with POST).
  //   Critical: Absolute http(s) URL.
  //   Recommended: Fixed LAN address; override with FANCTL_THERMOSTAT_URL.
  THERMOSTAT_URL: 'http://192.168.0.73/tstat',

  // CEILING_FAN_URLS
  //   Role: Ceiling fan control endpoints, driven in this order every cycle.
  //   Critical: Absolute http(s) URLs, no duplicates.
  //   Recommended: Fixed LAN addresses; override with FANCTL_CEILING_FAN_URLS (comma-separated).
  CEILING_FAN_URLS: [
    'http://192.168.0.75/mf',
    'http://192.168.0.76/mf',
    'http://192.168.0.77/mf'
  ],

  // CONSOLE_ENABLED
  //   Role: Master switch for Console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to Console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // GLOBAL_LOG_LEVEL
  //   Role: Current master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation, 0 (DEBUG) only during tuning.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours of uptime after which INFO entries are suppressed (0 disables).
  //   Critical: 0–720 h.
  //   Recommended: 0; the status line is the main record of what the loop did.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Protocol and engine constants that should rarely change
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<FanControlAppConstants> = {
  // LOG_LEVELS
  //   Role: Numeric codes for log severity.
  //   Recommended: Do not change; sinks and filters compare against these.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3
  },

  // FAILURE_REPORT_INTERVAL
  //   Role: Every Nth consecutive thermostat read failure is escalated to CRITICAL.
  //   Recommended: 6; with a 15 s poll that is one alert per ninety seconds of outage.
  FAILURE_REPORT_INTERVAL: 6,

  // HTTP_OK
  //   Role: The only status that counts as success for reads and commands.
  HTTP_OK: 200,

  // BLOWER_MODE_CODES
  //   Role: Thermostat `fmode` codes.
  //   Critical: Must match the thermostat API (0=AUTO, 1=CIRCULATE, 2=ON).
  BLOWER_MODE_CODES: {
    AUTO: 0,
    CIRCULATE: 1,
    ON: 2
  },

  // HEAT_ACTIVE_TSTATE
  //   Role: Thermostat `tstate` value meaning the heat call is active.
  HEAT_ACTIVE_TSTATE: 1,

  // MAX_FAN_SPEED
  //   Role: Highest speed step the ceiling fans accept.
  MAX_FAN_SPEED: 6,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
// ─────────────────────────────────────────────────────────────

const CONFIG: FanControlConfig = Object.freeze({ ...APP_CONSTANTS, ...USER_CONFIG });

export default CONFIG;
