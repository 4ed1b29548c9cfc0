import { parseEndpoint } from '../utils';
import { Client, type ClientOptions } from './client';
import { SerialClient, type SerialOptions } from './serial-client';
import { TcpClient } from './tcp-client';

export type TransportOptions = ClientOptions & SerialOptions;

/**
 * Build the client an address calls for: a serial path opens the port
 * directly, anything else is treated as a host:port gateway.
 * Serial settings are ignored for TCP gateways.
 */
export function createClient(address: string, options: TransportOptions = {}): Client {
    const endpoint = parseEndpoint(address);
    if (endpoint.kind === 'serial') {
        return new SerialClient(endpoint.path, options);
    }
    const { timeout, drainTimeout, logger } = options;
    return new TcpClient(endpoint.host, endpoint.port, { timeout, drainTimeout, logger });
}

export { Client, SerialClient, TcpClient };
export type { ClientOptions, SerialOptions };
