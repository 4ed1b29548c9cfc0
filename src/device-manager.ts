import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import ConnectionManager from './connection-manager';
import * as CONST from './constants';
import type { DeviceKind } from './discovery';
import { ValidationError } from './errors';
import { defaultLogger, type Logger } from './logger';
import { normalizeUnit } from './utils';

export interface Device {
    id: string;
    name: string;
    address: string;
    unit: string;
    kind: DeviceKind;
    addedAt: string;
}

function isDevice(value: unknown): value is Device {
    if (typeof value !== 'object' || value === null) return false;
    return 'id' in value && typeof value.id === 'string'
        && 'name' in value && typeof value.name === 'string'
        && 'address' in value && typeof value.address === 'string'
        && 'unit' in value && typeof value.unit === 'string'
        && 'kind' in value && (value.kind === 'meter' || value.kind === 'controller')
        && 'addedAt' in value && typeof value.addedAt === 'string';
}

function toKind(kind: unknown, fallback: DeviceKind): DeviceKind {
    return kind === 'meter' || kind === 'controller' ? kind : fallback;
}

/**
 * Registry of configured endpoints, kept as JSON beside the Node-RED
 * settings. Holds addressing only; device readings are never stored.
 *
 * Two entries name the same device when their addresses share a pool
 * key and their unit IDs match.
 */
export class DeviceManager {
    private readonly filePath: string;
    private readonly logger: Logger;
    private devices: Device[] = [];

    constructor(dir: string, logger: Logger = defaultLogger) {
        this.filePath = path.join(dir, CONST.REGISTRY_FILE);
        this.logger = logger.child({ registry: this.filePath });
        this.load();
    }

    /**
     * Read the registry file. Entries that are not endpoint records are
     * skipped; an unreadable file leaves the registry empty.
     */
    load(): void {
        this.devices = [];
        if (!fs.pathExistsSync(this.filePath)) return;

        let raw: unknown;
        try {
            raw = fs.readJsonSync(this.filePath);
        } catch (err) {
            this.logger.error({ err }, 'Registry file is not valid JSON; starting empty');
            return;
        }

        const entries: unknown[] = Array.isArray(raw) ? raw : [];
        this.devices = entries.filter(isDevice);
        const skipped = entries.length - this.devices.length;
        if (skipped > 0) {
            this.logger.warn({ skipped }, 'Ignored malformed registry entries');
        }
    }

    save(): void {
        try {
            fs.outputJsonSync(this.filePath, this.devices, { spaces: 2 });
        } catch (err) {
            this.logger.error({ err, count: this.devices.length }, 'Could not write registry file');
        }
    }

    list(): Device[] {
        return [...this.devices];
    }

    get(id: string): Device | undefined {
        return this.devices.find(d => d.id === id);
    }

    /**
     * Register an endpoint. The address must parse and the unit ID must be
     * a letter; kind defaults to controller.
     */
    add(device: Partial<Device>): Device {
        if (!device.address) {
            throw new ValidationError('address', 'An endpoint address is required');
        }
        ConnectionManager.keyOf(device.address);

        const unit = normalizeUnit(device.unit || CONST.DEFAULT_UNIT);
        const entry: Device = {
            id: crypto.randomUUID(),
            name: device.name || `Alicat ${unit} @ ${device.address}`,
            address: device.address,
            unit,
            kind: toKind(device.kind, 'controller'),
            addedAt: new Date().toISOString()
        };

        this.devices.push(entry);
        this.save();
        this.logger.info({ id: entry.id, address: entry.address, unit }, 'Endpoint registered');
        return entry;
    }

    /**
     * Return the entry for this address and unit, registering it if new.
     */
    upsert(device: Partial<Device>): Device {
        if (device.address) {
            const key = ConnectionManager.keyOf(device.address);
            const unit = normalizeUnit(device.unit || CONST.DEFAULT_UNIT);
            const existing = this.devices.find(d => d.unit === unit && ConnectionManager.keyOf(d.address) === key);
            if (existing) return existing;
        }
        return this.add(device);
    }

    update(id: string, data: Partial<Device>): Device {
        const current = this.get(id);
        if (!current) {
            throw new ValidationError('id', `No endpoint with id "${id}"`);
        }
        if (data.address) ConnectionManager.keyOf(data.address);

        const updated: Device = {
            ...current,
            name: data.name || current.name,
            address: data.address || current.address,
            unit: data.unit ? normalizeUnit(data.unit) : current.unit,
            kind: toKind(data.kind, current.kind)
        };

        this.devices = this.devices.map(d => (d.id === id ? updated : d));
        this.save();
        return updated;
    }

    /**
     * Forget an endpoint. Returns false when the id is unknown.
     */
    delete(id: string): boolean {
        const remaining = this.devices.filter(d => d.id !== id);
        if (remaining.length === this.devices.length) return false;

        this.devices = remaining;
        this.save();
        return true;
    }
}

export default DeviceManager;
