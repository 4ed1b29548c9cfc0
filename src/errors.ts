/**
 * Custom Error Classes for Alicat Operations
 * Device-level outcomes (rejection, verification, protocol) are kept apart
 * from caller mistakes (validation, configuration).
 */

/**
 * Error thrown when an endpoint address or unit ID cannot be used
 */
export class ConfigurationError extends Error {
    public value: string;

    constructor(value: string, message: string) {
        super(`Invalid configuration "${value}": ${message}`);
        this.name = 'ConfigurationError';
        this.value = value;
    }
}

/**
 * Error thrown when connection timeout occurs
 */
export class AlicatTimeoutError extends Error {
    public operation: string;
    public timeout: number;

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`);
        this.name = 'AlicatTimeoutError';
        this.operation = operation;
        this.timeout = timeout;
    }
}

/**
 * Error thrown by any operation on a closed session, or on one whose
 * transport gave up after too many timeouts
 */
export class UnopenedSessionError extends Error {
    public unit: string;
    public address: string;

    constructor(unit: string, address: string) {
        super(`The device with unit ID ${unit} and port ${address} is not open`);
        this.name = 'UnopenedSessionError';
        this.unit = unit;
        this.address = address;
    }
}

/**
 * Error thrown when a response cannot be interpreted
 */
export class ProtocolError extends Error {
    public response: string;

    constructor(response: string, message: string) {
        super(`${message} (response: "${response}")`);
        this.name = 'ProtocolError';
        this.response = response;
    }
}

/**
 * Error thrown when the echoed unit ID is not the session's
 */
export class UnitMismatchError extends ProtocolError {
    public expected: string;
    public actual: string;

    constructor(expected: string, actual: string, response: string) {
        super(response, `Unit ID mismatch: expected ${expected}, got ${actual}`);
        this.name = 'UnitMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Error thrown when the device answers "?"
 */
export class DeviceRejectionError extends Error {
    public intent: string;
    public command: string;

    constructor(intent: string, command: string) {
        super(`Device rejected ${intent} (command: "${command}")`);
        this.name = 'DeviceRejectionError';
        this.intent = intent;
        this.command = command;
    }
}

/**
 * Error thrown when a write does not read back as requested
 */
export class VerificationError extends Error {
    public intent: string;
    public expected: number | string;
    public actual: number | string | null;

    constructor(intent: string, expected: number | string, actual: number | string | null) {
        super(actual === null
            ? `Could not ${intent}: no read-back from device`
            : `Could not ${intent}: requested ${expected}, device reports ${actual}`);
        this.name = 'VerificationError';
        this.intent = intent;
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Error thrown for caller arguments, before any command is sent
 */
export class ValidationError extends Error {
    public field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Error thrown when the firmware lacks a requested feature
 */
export class UnsupportedFirmwareError extends Error {
    public firmware: string;

    constructor(firmware: string, feature: string) {
        super(`Firmware "${firmware}" does not support ${feature}`);
        this.name = 'UnsupportedFirmwareError';
        this.firmware = firmware;
    }
}
