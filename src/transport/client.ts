import type { Duplex } from 'stream';
import { Mutex } from 'async-mutex';
import { ReadlineParser } from '@serialport/parser-readline';
import * as CONST from '../constants';
import { defaultLogger, type Logger } from '../logger';
import { delay, withTimeout } from '../utils';

export interface ClientOptions {
    /** Connect and per-exchange timeout in ms (default 750). */
    timeout?: number;
    /** Stale byte discard window in ms (default 500). */
    drainTimeout?: number;
    logger?: Logger;
}

interface LineWaiter {
    resolve: (line: string) => void;
    reject: (err: Error) => void;
}

/**
 * Reconnecting line-oriented client.
 *
 * Subclasses only know how to open the underlying stream. Framing,
 * timeouts, timeout accounting and reconnection live here. One mutex
 * covers both connecting and each command/response pair, since the wire
 * protocol has no request IDs to match an answer to its question.
 */
export abstract class Client {
    public readonly address: string;
    public isOpen = false;
    public timeouts = 0;
    public readonly maxTimeouts = CONST.MAX_TIMEOUTS;
    public reconnecting = false;
    /** Set once maxTimeouts is reached; cleared only by reconnect(). */
    public failed = false;

    protected readonly timeout: number;
    protected readonly drainTimeout: number;
    protected readonly logger: Logger;

    private readonly lock = new Mutex();
    private stream: Duplex | null = null;
    private parser: ReadlineParser | null = null;
    private lines: string[] = [];
    private waiter: LineWaiter | null = null;

    constructor(address: string, options: ClientOptions = {}) {
        this.address = address;
        this.timeout = options.timeout ?? CONST.DEFAULT_TIMEOUT;
        this.drainTimeout = options.drainTimeout ?? CONST.DRAIN_TIMEOUT;
        this.logger = (options.logger ?? defaultLogger).child({ address });
    }

    /**
     * Open the physical link. Resolves with a connected duplex stream.
     */
    protected abstract connect(): Promise<Duplex>;

    /**
     * Connect if not already open. Never throws; a failed attempt leaves
     * isOpen false and is logged once per outage.
     */
    async open(): Promise<void> {
        await this.lock.runExclusive(async () => {
            if (this.isOpen || this.failed) return;

            const connecting = this.connect();
            try {
                const stream = await withTimeout(connecting, this.timeout, `connect ${this.address}`);
                this.attach(stream);
                await this.discard();
                if (this.reconnecting) {
                    this.logger.info('Connection restored');
                }
                this.reconnecting = false;
            } catch (err) {
                // A connect that completes after the timeout must not leak its stream.
                connecting.then(
                    late => { if (late !== this.stream) late.destroy(); },
                    lateErr => this.logger.debug({ err: lateErr }, 'Abandoned connect attempt failed')
                );
                if (!this.reconnecting) {
                    this.logger.error({ err }, `Connecting to ${this.address} failed`);
                }
                this.reconnecting = true;
            }
        });
    }

    /**
     * Write one command and wait for one response line.
     * Returns null when the link is down or the device does not answer.
     */
    async exchange(command: string): Promise<string | null> {
        await this.open();
        return this.lock.runExclusive(async () => {
            if (!this.isOpen) return null;

            // Anything already buffered cannot be the answer to this command.
            this.lines = [];
            try {
                await this.write(command + CONST.EOL);
                const line = await withTimeout(this.nextLine(), this.timeout, command);
                this.timeouts = 0;
                return line.replace(/\0/g, '').trim();
            } catch (err) {
                this.timeouts++;
                this.logger.debug({ err, command, timeouts: this.timeouts }, 'Exchange failed');
                if (this.timeouts >= this.maxTimeouts) {
                    this.logger.error(`Reading from ${this.address} timed out ${this.timeouts} times`);
                    this.failed = true;
                    await this.shutdown();
                }
                return null;
            } finally {
                this.waiter = null;
            }
        });
    }

    /**
     * Discard whatever arrives within the drain window. Used when another
     * consumer of the same link has left bytes behind.
     */
    async drain(): Promise<void> {
        await this.lock.runExclusive(() => this.discard());
    }

    /**
     * Clear the failed state and try to connect again.
     */
    async reconnect(): Promise<boolean> {
        this.failed = false;
        this.timeouts = 0;
        await this.open();
        return this.isOpen;
    }

    async close(): Promise<void> {
        await this.lock.runExclusive(() => this.shutdown());
    }

    private attach(stream: Duplex): void {
        const parser = stream.pipe(new ReadlineParser({ delimiter: CONST.EOL, encoding: 'ascii' }));
        parser.on('data', (line: string) => this.onLine(line));

        stream.on('error', (err: Error) => {
            this.logger.warn({ err }, 'Connection error');
            if (stream === this.stream) this.detach();
            stream.destroy();
        });
        stream.on('close', () => {
            if (stream === this.stream) this.detach();
        });

        this.stream = stream;
        this.parser = parser;
        this.lines = [];
        this.isOpen = true;
    }

    private detach(): void {
        if (this.stream && this.parser) {
            this.stream.unpipe(this.parser);
            this.parser.removeAllListeners('data');
        }
        this.stream = null;
        this.parser = null;
        this.isOpen = false;
        if (this.waiter) {
            this.waiter.reject(new Error('Connection closed'));
            this.waiter = null;
        }
    }

    private async shutdown(): Promise<void> {
        const stream = this.stream;
        this.detach();
        if (stream && !stream.destroyed) {
            await new Promise<void>(resolve => {
                stream.once('close', () => resolve());
                stream.destroy();
            });
        }
    }

    private async discard(): Promise<void> {
        this.lines = [];
        await delay(this.drainTimeout);
        const junk = this.lines.splice(0);
        if (junk.length > 0) {
            this.logger.warn({ junk }, 'Multiple connections detected; discarded stale data');
        }
    }

    private onLine(line: string): void {
        if (this.waiter) {
            const { resolve } = this.waiter;
            this.waiter = null;
            resolve(line);
        } else {
            this.lines.push(line);
        }
    }

    private nextLine(): Promise<string> {
        const buffered = this.lines.shift();
        if (buffered !== undefined) return Promise.resolve(buffered);
        return new Promise((resolve, reject) => {
            this.waiter = { resolve, reject };
        });
    }

    private write(data: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const stream = this.stream;
            if (!stream) {
                reject(new Error('Connection closed'));
                return;
            }
            stream.write(data, (err?: Error | null) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }
}
