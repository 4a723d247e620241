import type { IotUserConfig, IotAppConstants, IotConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for addressing,
//   classification, file locations, and observability.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<IotUserConfig> = {
  // SOURCE_ADDRESS
  //   Role: Address of the sensor node written into every sensor frame.
  //   Critical: Exactly 6 printable ASCII characters.
  //   Recommended: Stable per node; "013A5B" is the reference sensor.
  SOURCE_ADDRESS: '013A5B',

  // DESTINATION_ADDRESS
  //   Role: Address of the network layer that receives sensor frames.
  //   Critical: Exactly 6 printable ASCII characters.
  //   Recommended: "014D8E".
  DESTINATION_ADDRESS: '014D8E',

  // ACTUATOR_ADDRESS
  //   Role: Destination of derived signal frames (irrigation switch).
  //   Critical: Exactly 6 printable ASCII characters.
  //   Recommended: Distinct from SOURCE_ADDRESS; "025C8H".
  ACTUATOR_ADDRESS: '025C8H',

  // TRAINING_WINDOW_SIZE
  //   Role: Number of leading frames used to seed the classifier statistics.
  //   Critical: Integer ≥ 1 (error if <1 or fractional).
  //   Recommended: 1–168; 24 is one day of hourly samples.
  TRAINING_WINDOW_SIZE: 24,

  // MID_BAND_TOLERANCE
  //   Role: Half-width of the "mid" band around mt / mh, in °C or %.
  //   Critical: Finite and > 0.
  //   Recommended: 0.5–5; 1.5 keeps the mid band narrow for hourly weather data.
  MID_BAND_TOLERANCE: 1.5,

  // INPUT_ROWS_PATH
  //   Role: Comma-separated sensor rows (timestamp, temperature, humidity).
  //   Critical: Non-empty path, different from FRAME_FILE_PATH.
  //   Recommended: Keep raw inputs under input/.
  INPUT_ROWS_PATH: 'input/data.csv',

  // FRAME_FILE_PATH
  //   Role: Binary frame file written by encode and read by classify.
  //   Critical: Non-empty path, different from INPUT_ROWS_PATH.
  //   Recommended: input/frames.bin (git-ignored).
  FRAME_FILE_PATH: 'input/frames.bin',

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Acts as a floor; sinks cannot log below it regardless of their own minLevel.
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); 0 (DEBUG) shows every essential frame.
  GLOBAL_LOG_LEVEL: 1,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to the console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation.
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_COLORS
  //   Role: Colour console lines by level.
  //   Critical: Boolean only.
  //   Recommended: true; chalk drops colour by itself when output is not a TTY.
  CONSOLE_COLORS: true,

  // FILE_LOG_ENABLED
  //   Role: Master switch for the log file.
  //   Critical: Boolean only; FILE_LOG_PATH must be set when true.
  //   Recommended: false for ad-hoc runs, true for batch jobs.
  FILE_LOG_ENABLED: false,

  // FILE_LOG_LEVEL
  //   Role: Minimum log severity written to the log file (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 0 (DEBUG); the file is the place for per-frame detail.
  FILE_LOG_LEVEL: 0,

  // FILE_LOG_PATH
  //   Role: Log file location; its directory is created on start-up.
  //   Critical: Non-empty when FILE_LOG_ENABLED = true.
  //   Recommended: logs/pipeline.log (git-ignored).
  FILE_LOG_PATH: 'logs/pipeline.log',
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<IotAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct; every *_LOG_LEVEL must use these.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3 (standard convention).
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // CONSOLE_BUFFER_SIZE
  //   Role: Messages held by the console sink before it is initialized.
  //   Critical: ≥ 1.
  //   Recommended: 50; only start-up messages are ever held.
  CONSOLE_BUFFER_SIZE: 50,

  // FILE_BUFFER_SIZE
  //   Role: Messages held by the file sink before its directory exists.
  //   Critical: ≥ 1.
  //   Recommended: 50.
  FILE_BUFFER_SIZE: 50,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
//   Merges user config and app constants
// ─────────────────────────────────────────────────────────────

const CONFIG: IotConfig = Object.assign({}, APP_CONSTANTS, USER_CONFIG);

export default CONFIG;
