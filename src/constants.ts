/**
 * Alicat Constants
 * Centralized definitions for magic numbers and protocol values
 */

// Line Framing
export const EOL = '\r';                       // Command and response terminator
export const REJECTION = '?';                  // Device reply to a refused command

// Trailing Status Tokens
export const OVERRANGE_MARKERS = ['MOV', 'VOV', 'POV']; // Mass / volumetric / pressure over range
export const LOCK_FLAG = 'LCK';                // Front panel buttons locked

// Default Timeouts (ms)
export const DEFAULT_TIMEOUT = 750;            // Connect and per-exchange timeout
export const DRAIN_TIMEOUT = 500;              // Stale byte discard window
export const MAX_TIMEOUTS = 10;                // Consecutive failures before force close

// Default Serial Settings
export const DEFAULT_BAUD_RATE = 19200;
export const DEFAULT_DATA_BITS = 8;
export const DEFAULT_STOP_BITS = 1;
export const DEFAULT_PARITY = 'none';

// Unit IDs
export const DEFAULT_UNIT = 'A';
export const UNIT_PATTERN = /^[A-Z]$/;

// Registers
export const REG_CONTROL_POINT = 122;          // Setpoint source (R/W, no $$ prefix)
export const REG_GAS = 46;                     // Selected gas (low 9 bits)
export const REG_LOOP_TYPE = 85;               // PID loop algorithm
export const REG_P_GAIN = 21;
export const REG_D_GAIN = 22;
export const REG_I_GAIN = 23;
export const GAS_MASK = 0b111111111;

// Setpoint
export const SETPOINT_TOLERANCE = 0.01;        // Max |echo - requested|
export const SETPOINT_TOKEN_INDEX = 4;         // Value token carrying the echoed setpoint
export const FLOAT_EPSILON = 1e-9;             // Slack for binary rounding in the tolerance check

// Auto-read Backoff (ms)
export const BASE_RETRY_DELAY = 1000;          // First retry after a failed auto-read
export const MAX_RETRY_DELAY = 30000;          // Backoff cap

// Gas Mixes
export const MIN_MIX_SLOT = 236;
export const MAX_MIX_SLOT = 255;
export const MIX_TOTAL_PERCENT = 100;
export const MIX_UNSUPPORTED_FIRMWARE = ['2v', '3v', '4v', 'GP'];

// Node-RED
export const MIN_PACING_INTERVAL = 1;          // Minimum auto-read interval (seconds)
export const REGISTRY_FILE = 'alicat-devices.json';

/**
 * Gases in device order. A gas is written to register 46 by its index.
 */
export const GASES = [
    'Air', 'Ar', 'CH4', 'CO', 'CO2', 'C2H6', 'H2', 'He',
    'N2', 'N2O', 'Ne', 'O2', 'C3H8', 'n-C4H10', 'C2H2',
    'C2H4', 'i-C2H10', 'Kr', 'Xe', 'SF6', 'C-25', 'C-10',
    'C-8', 'C-2', 'C-75', 'A-75', 'A-25', 'A1025', 'Star29',
    'P-5'
] as const;

export type Gas = typeof GASES[number];

/**
 * Register 122 codes for each control point.
 */
export const CONTROL_POINT_REGISTERS = {
    mass_flow: 0b00100101,
    vol_flow: 0b00100100,
    abs_pressure: 0b00100010,
    gauge_pressure: 0b00100110,
    diff_pressure: 0b00100111
} as const;

export type ControlPoint = keyof typeof CONTROL_POINT_REGISTERS;

export const FLOW_CONTROL_POINTS: readonly ControlPoint[] = ['mass_flow', 'vol_flow'];
export const PRESSURE_CONTROL_POINTS: readonly ControlPoint[] = ['abs_pressure', 'gauge_pressure', 'diff_pressure'];

// Register 85 value -> loop type
export const LOOP_TYPES_READ = ['PD/PDF', 'PD/PDF', 'PD2I'] as const;
// Loop type -> register 85 value is index + 1
export const LOOP_TYPES_WRITE = ['PD/PDF', 'PD2I'] as const;

export type LoopType = typeof LOOP_TYPES_WRITE[number];
