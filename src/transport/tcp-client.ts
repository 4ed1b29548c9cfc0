import type { Duplex } from 'stream';
import net from 'net';
import { Client, type ClientOptions } from './client';

/**
 * Client for a device behind a TCP/IP <-> serial gateway.
 */
export class TcpClient extends Client {
    public readonly host: string;
    public readonly port: number;

    constructor(host: string, port: number, options: ClientOptions = {}) {
        super(`${host}:${port}`, options);
        this.host = host;
        this.port = port;
    }

    protected connect(): Promise<Duplex> {
        return new Promise((resolve, reject) => {
            const socket = new net.Socket();

            const onError = (err: Error) => {
                socket.destroy();
                reject(err);
            };

            socket.once('error', onError);
            socket.once('connect', () => {
                socket.off('error', onError);
                socket.setNoDelay(true);
                resolve(socket);
            });

            socket.connect(this.port, this.host);
        });
    }
}
