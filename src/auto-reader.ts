import * as CONST from './constants';
import type { FlowMeter } from './flow-meter';
import type { FieldValues } from './schema';

export interface AutoReadOptions {
    /** Time between reads while the device answers (ms). */
    intervalMs: number;
    baseRetryDelay?: number;
    maxRetryDelay?: number;
    /** Skip a tick while something else is talking to the device. */
    isBusy?: () => boolean;
}

export interface AutoReadHandlers {
    onState(state: FieldValues): void;
    onNoResponse(failures: number): void;
    onError(err: unknown, failures: number, retryIn: number): void;
    onRecovered(failures: number): void;
}

/**
 * Periodic reader with capped exponential backoff.
 *
 * A silent device keeps the normal interval, since the link counts its
 * own timeouts. A thrown error stops the interval; after the backoff the
 * session is reconnected and polling resumes. A session that gave up
 * after too many timeouts is reopened this way.
 */
export class AutoReader {
    public failures = 0;

    private readonly device: FlowMeter;
    private readonly handlers: AutoReadHandlers;
    private readonly intervalMs: number;
    private readonly baseRetryDelay: number;
    private readonly maxRetryDelay: number;
    private readonly isBusy: () => boolean;

    private intervalId: NodeJS.Timeout | null = null;
    private retryTimeoutId: NodeJS.Timeout | null = null;
    private retries = 0;
    private reading = false;
    private stopped = true;

    constructor(device: FlowMeter, options: AutoReadOptions, handlers: AutoReadHandlers) {
        this.device = device;
        this.handlers = handlers;
        this.intervalMs = options.intervalMs;
        this.baseRetryDelay = options.baseRetryDelay ?? CONST.BASE_RETRY_DELAY;
        this.maxRetryDelay = options.maxRetryDelay ?? CONST.MAX_RETRY_DELAY;
        this.isBusy = options.isBusy ?? (() => false);
    }

    get running(): boolean {
        return !this.stopped;
    }

    start(): void {
        if (!this.stopped) return;
        this.stopped = false;
        this.schedule();
        this.poll();
    }

    stop(): void {
        this.stopped = true;
        this.unschedule();
        if (this.retryTimeoutId) {
            clearTimeout(this.retryTimeoutId);
            this.retryTimeoutId = null;
        }
    }

    /**
     * Wait before the nth consecutive retry: base doubled per retry, capped.
     */
    retryDelay(retry: number): number {
        return Math.min(this.baseRetryDelay * Math.pow(2, Math.max(retry - 1, 0)), this.maxRetryDelay);
    }

    private poll(): void {
        if (this.stopped || this.reading || this.isBusy()) return;
        this.reading = true;

        this.device.read()
            .then(state => {
                if (state === null) {
                    this.failures++;
                    this.handlers.onNoResponse(this.failures);
                    return;
                }
                if (this.failures > 0) {
                    this.handlers.onRecovered(this.failures);
                }
                this.failures = 0;
                this.retries = 0;
                this.schedule();
                this.handlers.onState(state);
            })
            .catch(err => this.backOff(err))
            .finally(() => {
                this.reading = false;
            });
    }

    private backOff(err: unknown): void {
        this.failures++;
        this.retries++;
        this.unschedule();
        if (this.stopped) return;

        const delay = this.retryDelay(this.retries);
        this.handlers.onError(err, this.failures, delay);

        this.retryTimeoutId = setTimeout(() => {
            this.retryTimeoutId = null;
            if (this.stopped) return;
            this.device.reconnect().then(
                () => {
                    this.schedule();
                    this.poll();
                },
                reconnectErr => this.backOff(reconnectErr)
            );
        }, delay);
    }

    private schedule(): void {
        if (this.intervalId || this.stopped) return;
        this.intervalId = setInterval(() => this.poll(), this.intervalMs);
    }

    private unschedule(): void {
        if (this.intervalId) {
            clearInterval(this.intervalId);
            this.intervalId = null;
        }
    }
}

export default AutoReader;
