import type { Duplex } from 'stream';
import { SerialPort } from 'serialport';
import * as CONST from '../constants';
import { Client, type ClientOptions } from './client';

export type Parity = 'none' | 'even' | 'odd' | 'mark' | 'space';

export interface SerialOptions {
    baudRate?: number;
    dataBits?: 5 | 6 | 7 | 8;
    stopBits?: 1 | 1.5 | 2;
    parity?: Parity;
}

/**
 * Client for a directly connected RS-232/RS-485 or USB serial device.
 */
export class SerialClient extends Client {
    public readonly baudRate: number;
    public readonly dataBits: 5 | 6 | 7 | 8;
    public readonly stopBits: 1 | 1.5 | 2;
    public readonly parity: Parity;

    constructor(path: string, options: ClientOptions & SerialOptions = {}) {
        super(path, options);
        this.baudRate = options.baudRate ?? CONST.DEFAULT_BAUD_RATE;
        this.dataBits = options.dataBits ?? CONST.DEFAULT_DATA_BITS;
        this.stopBits = options.stopBits ?? CONST.DEFAULT_STOP_BITS;
        this.parity = options.parity ?? CONST.DEFAULT_PARITY;
    }

    protected connect(): Promise<Duplex> {
        return new Promise((resolve, reject) => {
            const port = new SerialPort({
                path: this.address,
                baudRate: this.baudRate,
                dataBits: this.dataBits,
                stopBits: this.stopBits,
                parity: this.parity,
                autoOpen: false
            });

            port.open((err) => {
                if (err) reject(err);
                else resolve(port);
            });
        });
    }
}
