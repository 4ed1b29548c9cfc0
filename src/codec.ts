/**
 * Alicat ASCII codec
 * Pure encode/decode helpers; nothing here touches the transport.
 */

import * as CONST from './constants';
import { ProtocolError } from './errors';
import { isFloat } from './utils';

export interface DecodedLine {
    unit: string;
    tokens: string[];
}

export interface LockExtraction {
    locked: boolean;
    tokens: string[];
}

/**
 * Build a command by plain concatenation, e.g. encode('A', 'S', '5.00') -> "AS5.00"
 */
export function encode(unit: string, op: string, ...args: Array<string | number>): string {
    return unit + op + args.join('');
}

/**
 * Split a response line into the echoed unit ID and its value tokens
 */
export function decode(line: string): DecodedLine {
    const [unit = '', ...tokens] = line.trim().split(/\s+/);
    return { unit, tokens };
}

/**
 * Drop trailing overrange markers (MOV/VOV/POV, possibly stacked)
 */
export function stripOverrange(tokens: string[]): string[] {
    const out = [...tokens];
    while (out.length > 0 && CONST.OVERRANGE_MARKERS.includes(out[out.length - 1].toUpperCase())) {
        out.pop();
    }
    return out;
}

/**
 * Remove a trailing LCK flag and report whether it was present
 */
export function extractLock(tokens: string[]): LockExtraction {
    if (tokens.length > 0 && tokens[tokens.length - 1].toUpperCase() === CONST.LOCK_FLAG) {
        return { locked: true, tokens: tokens.slice(0, -1) };
    }
    return { locked: false, tokens };
}

export function coerce(token: string): number | string {
    return isFloat(token) ? parseFloat(token) : token;
}

export function isRejection(line: string): boolean {
    return line.trim() === CONST.REJECTION;
}

export function formatSetpoint(value: number): string {
    return value.toFixed(2);
}

/**
 * Register read command. Control point uses a bare "R", PID and gas use "$$R"/"$$r".
 */
export function registerRead(unit: string, register: number, prefix = '$$R'): string {
    return encode(unit, prefix, register);
}

export function registerWrite(unit: string, register: number, value: number, prefix = '$$W'): string {
    return encode(unit, prefix, register, '=', value);
}

/**
 * Read the integer value of a register response, e.g. "A   00122 = 37" -> 37.
 * Without "=" the last token carries the value.
 */
export function parseRegisterValue(line: string): number {
    const raw = line.includes('=')
        ? line.slice(line.lastIndexOf('=') + 1).trim()
        : decode(line).tokens.slice(-1)[0] ?? '';
    if (!/^[+-]?\d+$/.test(raw)) {
        throw new ProtocolError(line, 'Register value is not an integer');
    }
    return parseInt(raw, 10);
}
