import { FlowMeter, type FlowMeterOptions } from './flow-meter';
import { defaultLogger } from './logger';
import { hasSetpoint } from './schema';

export type DeviceKind = 'meter' | 'controller';

interface Closable {
    close(): Promise<void>;
}

/**
 * Run an action against a session and always close it afterwards.
 */
export async function withDevice<D extends Closable, T>(device: D, action: (device: D) => Promise<T>): Promise<T> {
    try {
        return await action(device);
    } finally {
        await device.close();
    }
}

/**
 * Check what answers at an address.
 *
 * Opens a session, reads once and closes it. A response carrying a
 * setpoint field comes from a controller, one without from a meter.
 * Resolves to null when nothing usable answers; never throws.
 */
export async function probe(address: string, options: FlowMeterOptions = {}): Promise<DeviceKind | null> {
    const logger = options.logger ?? defaultLogger;
    try {
        const device = new FlowMeter(address, options);
        return await withDevice(device, async (meter) => {
            const state = await meter.read();
            if (state === null) return null;
            return hasSetpoint(meter.schema) ? 'controller' : 'meter';
        });
    } catch (err) {
        logger.debug({ err, address }, 'Probe failed');
        return null;
    }
}

/**
 * True if a flow meter (no setpoint) answers at the address.
 */
export async function isMeter(address: string, unit = 'A', options: FlowMeterOptions = {}): Promise<boolean> {
    return await probe(address, { ...options, unit }) === 'meter';
}

/**
 * True if a flow controller answers at the address.
 */
export async function isController(address: string, unit = 'A', options: FlowMeterOptions = {}): Promise<boolean> {
    return await probe(address, { ...options, unit }) === 'controller';
}
