import * as CONST from './constants';
import type { ControlPoint, LoopType } from './constants';
import { decode, encode, formatSetpoint, isRejection, parseRegisterValue, registerRead, registerWrite } from './codec';
import {
    DeviceRejectionError,
    ProtocolError,
    UnsupportedFirmwareError,
    ValidationError,
    VerificationError
} from './errors';
import { FlowMeter } from './flow-meter';
import type { FieldValues } from './schema';
import { isFloat } from './utils';

export type ControllerState = FieldValues & { control_point: ControlPoint | null };

export interface PidValues {
    loopType: LoopType;
    P: number;
    D: number;
    I: number;
}

export interface PidSettings {
    p?: number;
    i?: number;
    d?: number;
    loopType?: string;
}

export function isControlPoint(value: string): value is ControlPoint {
    return Object.prototype.hasOwnProperty.call(CONST.CONTROL_POINT_REGISTERS, value);
}

function controlPointForCode(code: number): ControlPoint | null {
    for (const point of Object.keys(CONST.CONTROL_POINT_REGISTERS)) {
        if (isControlPoint(point) && CONST.CONTROL_POINT_REGISTERS[point] === code) {
            return point;
        }
    }
    return null;
}

function assertFinite(field: string, value: number): void {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ValidationError(field, `${field} must be a finite number`);
    }
}

function assertMixSlot(slot: number): void {
    if (!Number.isInteger(slot) || slot < CONST.MIN_MIX_SLOT || slot > CONST.MAX_MIX_SLOT) {
        throw new ValidationError('slot', `Mix number must be between ${CONST.MIN_MIX_SLOT}-${CONST.MAX_MIX_SLOT}!`);
    }
}

function gasIndex(gas: string): number {
    return CONST.GASES.findIndex(g => g === gas);
}

/**
 * Driver for Alicat flow controllers.
 *
 * Adds the writable surface: setpoints, control point, gas selection,
 * COMPOSER mixes, PID gains, tares, valve hold and button lock. To drive
 * the device over serial, its "Input" option must be set to "Serial".
 *
 * The control point (register 122) decides whether a setpoint targets a
 * flow or a pressure. It is cached once read or written, and switching
 * category always zeroes the setpoint first.
 */
export class FlowController extends FlowMeter {
    public controlPoint: ControlPoint | null = null;

    /**
     * Device state plus the cached control point.
     */
    async read(): Promise<ControllerState | null> {
        const state = await super.read();
        if (state === null) return null;
        return { ...state, control_point: this.controlPoint };
    }

    /**
     * Set the target flow rate, in the units chosen at time of order.
     */
    async setFlowRate(flowRate: number): Promise<void> {
        assertFinite('flowRate', flowRate);
        await this.ensureControlPoint();
        if (this.controlPoint !== null && CONST.PRESSURE_CONTROL_POINTS.includes(this.controlPoint)) {
            await this.writeSetpoint(0);
            await this.writeControlPoint('mass_flow');
        }
        await this.writeSetpoint(flowRate);
    }

    /**
     * Set the target pressure, in the units chosen at time of order (usually psia).
     */
    async setPressure(pressure: number): Promise<void> {
        assertFinite('pressure', pressure);
        await this.ensureControlPoint();
        if (this.controlPoint !== null && CONST.FLOW_CONTROL_POINTS.includes(this.controlPoint)) {
            await this.writeSetpoint(0);
            await this.writeControlPoint('abs_pressure');
        }
        await this.writeSetpoint(pressure);
    }

    /**
     * Read register 122 and cache the result. Null when the device does not answer.
     */
    async readControlPoint(): Promise<ControlPoint | null> {
        const line = await this.query(registerRead(this.unit, CONST.REG_CONTROL_POINT, 'R'), 'read control point');
        if (line === null) return null;

        const code = parseRegisterValue(line);
        const point = controlPointForCode(code);
        if (point === null) {
            throw new ProtocolError(line, `Unexpected register value: ${code}`);
        }
        this.controlPoint = point;
        return point;
    }

    /**
     * Point setpoints at a flow or pressure register. The cache only
     * changes once the device echoes the new code.
     */
    async writeControlPoint(point: string): Promise<void> {
        if (!isControlPoint(point)) {
            throw new ValidationError('point', `Control point must be one of: ${Object.keys(CONST.CONTROL_POINT_REGISTERS).join(', ')}`);
        }
        const code = CONST.CONTROL_POINT_REGISTERS[point];
        const line = await this.query(registerWrite(this.unit, CONST.REG_CONTROL_POINT, code, 'W'), 'set control point');
        const echoed = line === null ? null : parseRegisterValue(line);
        if (echoed !== code) {
            throw new VerificationError('set control point', code, echoed);
        }
        this.controlPoint = point;
    }

    /**
     * Select a gas by name or by its number. Mixes can only be selected by number.
     */
    async setGas(gas: string | number): Promise<void> {
        let gasNumber: number;
        if (typeof gas === 'string') {
            gasNumber = gasIndex(gas);
            if (gasNumber === -1) {
                throw new ValidationError('gas', `${gas} not supported!`);
            }
        } else {
            if (!Number.isInteger(gas) || gas < 0 || gas > CONST.GAS_MASK) {
                throw new ValidationError('gas', `Gas number must be an integer between 0-${CONST.GAS_MASK}`);
            }
            gasNumber = gas;
        }

        await this.query(registerWrite(this.unit, CONST.REG_GAS, gasNumber, '$$W'), 'set gas');
        const line = await this.query(registerRead(this.unit, CONST.REG_GAS, '$$R'), 'read gas');
        const selected = line === null ? null : parseRegisterValue(line) & CONST.GAS_MASK;
        if (selected !== gasNumber) {
            throw new VerificationError('set gas', gasNumber, selected);
        }
    }

    /**
     * Create a COMPOSER gas mix (firmware 5v or later).
     *
     * @param slot - Mix number, 236-255
     * @param name - Front panel name; the device cuts it to six letters
     * @param gases - Gas name to percentage, summing to 100
     */
    async createMix(slot: number, name: string, gases: Record<string, number>): Promise<void> {
        assertMixSlot(slot);
        if (!name || /\s/.test(name)) {
            throw new ValidationError('name', 'Mix name must be a single word');
        }

        const entries = Object.entries(gases);
        if (entries.length === 0) {
            throw new ValidationError('gases', 'Mix must contain at least one gas');
        }
        for (const [gas, percent] of entries) {
            if (gasIndex(gas) === -1) {
                throw new ValidationError('gases', `${gas} not supported!`);
            }
            assertFinite(`gases.${gas}`, percent);
        }
        const total = entries.reduce((sum, [, percent]) => sum + percent, 0);
        if (total !== CONST.MIX_TOTAL_PERCENT) {
            throw new ValidationError('gases', 'Percentages of gas mix must add to 100%!');
        }

        const firmware = await this.readFirmwareVersion();
        if (firmware === null || CONST.MIX_UNSUPPORTED_FIRMWARE.some(v => firmware.includes(v))) {
            throw new UnsupportedFirmwareError(firmware ?? 'unknown', 'COMPOSER gas mixes');
        }

        const gasList = entries.map(([gas, percent]) => `${percent} ${gasIndex(gas)}`).join(' ');
        const command = [this.unit, 'GM', name, String(slot), gasList].join(' ');
        const line = await this.send(command);
        if (line !== null && isRejection(line)) {
            throw new DeviceRejectionError('create mix', command);
        }
    }

    async deleteMix(slot: number): Promise<void> {
        assertMixSlot(slot);
        await this.command(`GD${slot}`, 'delete mix');
    }

    /** Lock the front panel buttons. */
    async lock(): Promise<void> {
        await this.command('$$L', 'lock');
    }

    async unlock(): Promise<void> {
        await this.command('$$U', 'unlock');
    }

    async tarePressure(): Promise<void> {
        await this.command('$$PC', 'tare pressure');
    }

    async tareVolumetric(): Promise<void> {
        await this.command('$$V', 'tare flow');
    }

    async resetTotalizer(): Promise<void> {
        await this.command('T', 'reset totalizer');
    }

    /**
     * Valve hold. Single valve and dual valve flow controllers hold the
     * valve where it is; dual valve pressure controllers close both.
     */
    async hold(): Promise<void> {
        await this.command('$$H', 'hold valve');
    }

    async cancelHold(): Promise<void> {
        await this.command('$$C', 'cancel valve hold');
    }

    /**
     * Read the loop type and the P, D and I gains. Null when the device does not answer.
     */
    async readPID(): Promise<PidValues | null> {
        const loopLine = await this.query(registerRead(this.unit, CONST.REG_LOOP_TYPE, '$$r'), 'read loop type');
        if (loopLine === null) return null;

        const loopNum = parseRegisterValue(loopLine);
        if (loopNum < 0 || loopNum >= CONST.LOOP_TYPES_READ.length) {
            throw new ProtocolError(loopLine, `Unexpected loop type: ${loopNum}`);
        }

        const gains: number[] = [];
        for (const register of [CONST.REG_P_GAIN, CONST.REG_D_GAIN, CONST.REG_I_GAIN]) {
            const line = await this.query(registerRead(this.unit, register, '$$r'), `read register ${register}`);
            if (line === null) return null;
            gains.push(parseRegisterValue(line));
        }

        const [P, D, I] = gains;
        return { loopType: CONST.LOOP_TYPES_READ[loopNum], P, D, I };
    }

    /**
     * Write any of loop type, P, I and D, in that order, by direct register writes.
     * I is only used by the PD2I loop.
     */
    async writePID(settings: PidSettings): Promise<void> {
        const { p, i, d, loopType } = settings;
        let loopNum: number | undefined;
        if (loopType !== undefined) {
            const index = CONST.LOOP_TYPES_WRITE.findIndex(t => t === loopType);
            if (index === -1) {
                throw new ValidationError('loopType', `Loop type must be ${CONST.LOOP_TYPES_WRITE[0]} or ${CONST.LOOP_TYPES_WRITE[1]}.`);
            }
            loopNum = index + 1;
        }
        if (p !== undefined) assertFinite('p', p);
        if (i !== undefined) assertFinite('i', i);
        if (d !== undefined) assertFinite('d', d);

        const writes: Array<[number, number | undefined]> = [
            [CONST.REG_LOOP_TYPE, loopNum],
            [CONST.REG_P_GAIN, p],
            [CONST.REG_I_GAIN, i],
            [CONST.REG_D_GAIN, d]
        ];
        for (const [register, value] of writes) {
            if (value === undefined) continue;
            await this.command(`$$w${register}=${value}`, `write register ${register}`);
        }
    }

    /**
     * Write a setpoint in the current control point's units and check the echo.
     */
    protected async writeSetpoint(setpoint: number): Promise<void> {
        const command = encode(this.unit, 'S', formatSetpoint(setpoint));
        const line = await this.query(command, 'set setpoint');
        if (line === null) {
            throw new VerificationError('set setpoint', setpoint, null);
        }

        const echoed = decode(line).tokens[CONST.SETPOINT_TOKEN_INDEX];
        if (echoed === undefined) return;
        if (!isFloat(echoed)) {
            throw new VerificationError('set setpoint', setpoint, echoed);
        }

        const current = parseFloat(echoed);
        if (Math.abs(current - setpoint) - CONST.SETPOINT_TOLERANCE > CONST.FLOAT_EPSILON) {
            throw new VerificationError('set setpoint', setpoint, current);
        }
    }

    private async ensureControlPoint(): Promise<void> {
        if (this.controlPoint === null) {
            await this.readControlPoint();
        }
    }
}
