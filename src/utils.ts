/**
 * Alicat Utility Functions
 * Reusable helpers shared by the transport and device layers
 */

import * as CONST from './constants';
import { AlicatTimeoutError, ConfigurationError } from './errors';

export type Endpoint =
    | { kind: 'serial'; path: string }
    | { kind: 'tcp'; host: string; port: number };

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Check whether a token is a decimal floating point literal
 *
 * @param {string} token - Raw response token
 * @returns {boolean} True if the token should be read as a number
 */
export function isFloat(token: string): boolean {
    return FLOAT_PATTERN.test(token);
}

/**
 * Decide whether an address names a local serial port
 */
export function isSerialPath(address: string): boolean {
    return address.startsWith('/') || /^COM\d+$/i.test(address);
}

/**
 * Parse an endpoint address
 * Supports:
 * - Serial: /dev/ttyUSB0, COM3
 * - TCP gateway: 192.168.1.10:23, gateway.local:4001
 *
 * @param {string} address - Endpoint address
 * @returns {Endpoint} Serial path or TCP host/port
 * @throws {ConfigurationError} If a non-serial address is not host:port
 */
export function parseEndpoint(address: string): Endpoint {
    const trimmed = address.trim();
    if (isSerialPath(trimmed)) {
        return { kind: 'serial', path: trimmed };
    }

    const parts = trimmed.split(':');
    if (parts.length !== 2) {
        throw new ConfigurationError(address, 'address must be hostname:port');
    }

    const [host, portStr] = parts;
    const port = Number(portStr);
    if (!host || !/^\d+$/.test(portStr) || port < 1 || port > 65535) {
        throw new ConfigurationError(address, 'address must be hostname:port');
    }

    return { kind: 'tcp', host, port };
}

/**
 * Validate and normalise a unit ID
 *
 * @param {string} unit - Single letter A-Z (lower case accepted)
 * @returns {string} Upper case unit ID
 */
export function normalizeUnit(unit: string): string {
    const upper = unit.trim().toUpperCase();
    if (!CONST.UNIT_PATTERN.test(upper)) {
        throw new ConfigurationError(unit, 'unit ID must be a single letter A-Z');
    }
    return upper;
}

/**
 * Race an operation against a timer. The timer is cleared once the race settles.
 *
 * @param {Promise} operation - Operation to perform
 * @param {number} timeoutMs - Timeout in milliseconds
 * @param {string} operationName - Name of operation for error message
 * @returns {Promise} Result of operation or timeout error
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new AlicatTimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
