import { createClient, type Client, type TransportOptions } from './transport';
import { parseEndpoint } from './utils';

interface PoolEntry {
    client: Client;
    refs: number;
}

export type ClientFactory = (address: string, options: TransportOptions) => Client;

/**
 * Manages a pool of shared device links.
 *
 * Several sessions addressing different unit IDs on one RS-485 bus or
 * gateway share a single client, and therefore a single mutex, so their
 * command/response pairs never interleave. The link is closed when the
 * last session releases it.
 */
export class ConnectionManager {
    private pool: Map<string, PoolEntry>;
    private factory: ClientFactory;

    constructor(factory: ClientFactory = createClient) {
        // Map<key, { client, refs }>
        this.pool = new Map();
        this.factory = factory;
    }

    /**
     * Pool key for an address: serial path as given, TCP host lower-cased.
     */
    static keyOf(address: string): string {
        const endpoint = parseEndpoint(address);
        return endpoint.kind === 'serial' ? endpoint.path : `${endpoint.host.toLowerCase()}:${endpoint.port}`;
    }

    /**
     * Get the shared client for an address, creating it on first use.
     * Options only apply when the client is created.
     */
    acquire(address: string, options: TransportOptions = {}): Client {
        const key = ConnectionManager.keyOf(address);

        let entry = this.pool.get(key);
        if (!entry) {
            entry = {
                client: this.factory(address, options),
                refs: 0
            };
            this.pool.set(key, entry);
        }

        entry.refs++;
        return entry.client;
    }

    /**
     * Drop one reference; the last one closes the link.
     */
    async release(address: string): Promise<void> {
        const key = ConnectionManager.keyOf(address);
        const entry = this.pool.get(key);
        if (!entry) return;

        entry.refs--;
        if (entry.refs <= 0) {
            this.pool.delete(key);
            await entry.client.close();
        }
    }

    /**
     * Run an action against the shared client, holding a reference for its duration.
     */
    async request<T>(address: string, action: (client: Client) => Promise<T>, options?: TransportOptions): Promise<T> {
        const client = this.acquire(address, options);
        try {
            return await action(client);
        } finally {
            await this.release(address);
        }
    }

    refCount(address: string): number {
        return this.pool.get(ConnectionManager.keyOf(address))?.refs ?? 0;
    }

    get size(): number {
        return this.pool.size;
    }

    async closeAll(): Promise<void> {
        const entries = [...this.pool.values()];
        this.pool.clear();
        await Promise.all(entries.map(entry => entry.client.close()));
    }
}

export default ConnectionManager;
