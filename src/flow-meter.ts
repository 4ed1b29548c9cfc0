import * as CONST from './constants';
import { decode, encode, extractLock, isRejection, stripOverrange } from './codec';
import type { ConnectionManager } from './connection-manager';
import { DeviceRejectionError, UnitMismatchError, UnopenedSessionError } from './errors';
import { defaultLogger, type Logger } from './logger';
import { mapFields, SCHEMAS, selectSchema, type FieldSchema, type FieldValues } from './schema';
import { createClient, type Client, type TransportOptions } from './transport';
import { normalizeUnit } from './utils';

export interface FlowMeterOptions extends TransportOptions {
    /** Alicat unit ID, A-Z. Default "A". */
    unit?: string;
    /** Share the link through a pool instead of owning it. */
    pool?: ConnectionManager;
    /** Use an existing client; the meter takes ownership and closes it. */
    client?: Client;
}

/**
 * Driver for Alicat flow meters.
 *
 * Talks to the device over USB, RS-232/RS-485 or an Ethernet to serial
 * gateway. A meter only reads; see FlowController for setpoints.
 */
export class FlowMeter {
    public readonly address: string;
    public readonly unit: string;
    public isOpen = true;
    /** Shape of the last response, starting from the six-field layout. */
    public schema: FieldSchema = SCHEMAS.standard;
    public buttonLock = false;

    protected readonly client: Client;
    protected readonly logger: Logger;
    private readonly pool: ConnectionManager | null;
    private firmware: string | null = null;

    constructor(address = '/dev/ttyUSB0', options: FlowMeterOptions = {}) {
        const { unit = CONST.DEFAULT_UNIT, pool, client, ...transport } = options;
        this.address = address;
        this.unit = normalizeUnit(unit);
        this.pool = pool ?? null;
        this.logger = (options.logger ?? defaultLogger).child({ unit: this.unit });

        if (client) {
            this.client = client;
        } else if (pool) {
            this.client = pool.acquire(address, transport);
        } else {
            this.client = createClient(address, transport);
        }
    }

    /**
     * Get the current state of the device.
     *
     * Fields, as reported by the device:
     *  - pressure (normally psia) and temperature (normally C)
     *  - volumetric and mass flow, in units chosen at time of order
     *  - setpoint, on controllers
     *  - total_flow, on models with the totalizer option
     *  - gas, the selected gas name
     *
     * Resolves to null when the device does not answer.
     */
    async read(): Promise<FieldValues | null> {
        const line = await this.query(this.unit, 'read state');
        if (line === null) return null;

        const lock = extractLock(stripOverrange(decode(line).tokens));
        this.buttonLock = lock.locked;

        const schema = selectSchema(lock.tokens.length, this.schema);
        if (schema !== this.schema) {
            this.logger.debug({ from: this.schema.tag, to: schema.tag }, 'Response shape changed');
            this.schema = schema;
        }
        return mapFields(schema, lock.tokens);
    }

    /**
     * Whether the front panel buttons are locked, as of a fresh read.
     */
    async isLocked(): Promise<boolean> {
        await this.read();
        return this.buttonLock;
    }

    /**
     * Firmware version string. Queried once, then cached for the session.
     * A "?" reply is a rejection and is never cached.
     */
    async readFirmwareVersion(): Promise<string | null> {
        if (this.firmware === null) {
            this.firmware = await this.command('VE', 'read firmware version');
        }
        return this.firmware;
    }

    /**
     * Discard unread bytes left on the link by another consumer.
     */
    async flush(): Promise<void> {
        this.assertOpen();
        await this.client.drain();
    }

    /**
     * Recover a link that gave up after too many timeouts.
     */
    async reconnect(): Promise<boolean> {
        if (!this.isOpen) {
            throw new UnopenedSessionError(this.unit, this.address);
        }
        return this.client.reconnect();
    }

    /**
     * Close the session. A pooled link stays up while other sessions hold it.
     */
    async close(): Promise<void> {
        if (!this.isOpen) return;
        this.isOpen = false;
        if (this.pool) {
            await this.pool.release(this.address);
        } else {
            await this.client.close();
        }
    }

    protected assertOpen(): void {
        if (!this.isOpen || this.client.failed) {
            throw new UnopenedSessionError(this.unit, this.address);
        }
    }

    protected async send(command: string): Promise<string | null> {
        this.assertOpen();
        return this.client.exchange(command);
    }

    /**
     * Send a command whose answer must be a response from this unit.
     * Throws on "?" and on another unit's echo; null when nothing came back.
     */
    protected async query(command: string, intent: string): Promise<string | null> {
        const line = await this.send(command);
        if (line === null) return null;
        if (isRejection(line)) {
            throw new DeviceRejectionError(intent, command);
        }

        const { unit } = decode(line);
        if (unit !== this.unit) {
            throw new UnitMismatchError(this.unit, unit, line);
        }
        return line;
    }

    /**
     * Send a command that has no structured answer. Only "?" means failure.
     */
    protected async command(op: string, intent: string): Promise<string | null> {
        const command = encode(this.unit, op);
        const line = await this.send(command);
        if (line !== null && isRejection(line)) {
            throw new DeviceRejectionError(intent, command);
        }
        return line;
    }
}
