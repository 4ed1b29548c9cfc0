import {
    DeviceRejectionError,
    ProtocolError,
    UnsupportedFirmwareError,
    ValidationError,
    VerificationError
} from '../src/errors';
import { FlowController } from '../src/flow-controller';
import { FakeClient, FakeLink, silentLogger } from './helpers/fake-device';

describe('FlowController', () => {
    let link: FakeLink;
    let controller: FlowController;
    let replies: Record<string, string>;

    beforeEach(() => {
        replies = { A: 'A +014.70 +025.00 +000.00 +000.00 +000.00 N2' };
        // Unlisted setpoint writes echo the requested value back
        link = new FakeLink((command) => {
            if (command in replies) return replies[command];
            if (command.startsWith('AS')) return `A 14.7 25.0 0.0 0.0 ${command.slice(2)} N2`;
            return null;
        });
        controller = new FlowController('/dev/ttyUSB0', { client: new FakeClient(link), logger: silentLogger });
    });

    afterEach(async () => {
        await controller.close();
    });

    describe('read', () => {
        test('includes the cached control point', async () => {
            await expect(controller.read()).resolves.toEqual({
                pressure: 14.7,
                temperature: 25,
                volumetric_flow: 0,
                mass_flow: 0,
                setpoint: 0,
                gas: 'N2',
                control_point: null
            });

            replies.AR122 = 'A   00122 = 37';
            await controller.readControlPoint();
            const state = await controller.read();
            expect(state?.control_point).toBe('mass_flow');
        });

        test('resolves to null when the device is silent', async () => {
            delete replies.A;
            await expect(controller.read()).resolves.toBeNull();
        });
    });

    describe('setFlowRate', () => {
        test('reads the control point first when unknown', async () => {
            replies.AR122 = 'A   00122 = 37';
            await controller.setFlowRate(5);
            expect(link.written).toEqual(['AR122', 'AS5.00']);
            expect(controller.controlPoint).toBe('mass_flow');
        });

        test('zeroes the setpoint before leaving pressure control', async () => {
            replies.AR122 = 'A   00122 = 34';
            replies['AW122=37'] = 'A   00122 = 37';
            await controller.setFlowRate(5);
            expect(link.written).toEqual(['AR122', 'AS0.00', 'AW122=37', 'AS5.00']);
            expect(controller.controlPoint).toBe('mass_flow');
        });

        test('stays on volumetric flow', async () => {
            controller.controlPoint = 'vol_flow';
            await controller.setFlowRate(1.5);
            expect(link.written).toEqual(['AS1.50']);
            expect(controller.controlPoint).toBe('vol_flow');
        });

        test('rejects a non-finite rate before sending', async () => {
            await expect(controller.setFlowRate(NaN)).rejects.toThrow(ValidationError);
            await expect(controller.setFlowRate(Infinity)).rejects.toThrow(ValidationError);
            expect(link.written).toEqual([]);
        });

        test('fails when the control point cannot be interpreted', async () => {
            replies.AR122 = 'A   00122 = 99';
            await expect(controller.setFlowRate(5)).rejects.toThrow(ProtocolError);
            expect(link.written).toEqual(['AR122']);
        });
    });

    describe('setPressure', () => {
        test('switches from flow control to absolute pressure', async () => {
            controller.controlPoint = 'mass_flow';
            replies['AW122=34'] = 'A   00122 = 34';
            await controller.setPressure(30);
            expect(link.written).toEqual(['AS0.00', 'AW122=34', 'AS30.00']);
            expect(controller.controlPoint).toBe('abs_pressure');
        });

        test('keeps an existing pressure control point', async () => {
            controller.controlPoint = 'gauge_pressure';
            await controller.setPressure(30);
            expect(link.written).toEqual(['AS30.00']);
            expect(controller.controlPoint).toBe('gauge_pressure');
        });
    });

    describe('setpoint read-back', () => {
        beforeEach(() => {
            controller.controlPoint = 'mass_flow';
        });

        test('accepts an echo within 0.01', async () => {
            replies['AS0.00'] = 'A 14.7 25.0 0.0 0.0 0.01 N2';
            await expect(controller.setFlowRate(0)).resolves.toBeUndefined();
        });

        test.each([
            [1, '1.01'],
            [0.5, '0.51'],
            [4.1, '4.09'],
            [12.34, '12.35']
        ])('accepts %p echoed as %s', async (requested, echo) => {
            replies[`AS${requested.toFixed(2)}`] = `A 14.7 25.0 0.0 0.0 ${echo} N2`;
            await expect(controller.setFlowRate(requested)).resolves.toBeUndefined();
        });

        test('rejects 1 echoed as 1.0100001', async () => {
            replies['AS1.00'] = 'A 14.7 25.0 0.0 0.0 1.0100001 N2';
            await expect(controller.setFlowRate(1)).rejects.toThrow(VerificationError);
        });

        test('rejects an echo outside 0.01', async () => {
            replies['AS0.00'] = 'A 14.7 25.0 0.0 0.0 0.0100001 N2';
            await expect(controller.setFlowRate(0)).rejects.toThrow(VerificationError);
        });

        test('reports the echoed value', async () => {
            replies['AS5.00'] = 'A 14.7 25.0 0.0 0.0 4.00 N2';
            await expect(controller.setFlowRate(5)).rejects.toThrow('Could not set setpoint: requested 5, device reports 4');
        });

        test('fails when the device stays silent', async () => {
            link.responder = () => null;
            await expect(controller.setFlowRate(5)).rejects.toThrow('Could not set setpoint: no read-back from device');
        });

        test('accepts a response too short to carry the setpoint', async () => {
            replies['AS5.00'] = 'A 14.7';
            await expect(controller.setFlowRate(5)).resolves.toBeUndefined();
        });

        test('rejects a non-numeric echo', async () => {
            replies['AS5.00'] = 'A 14.7 25.0 0.0 0.0 N2';
            await expect(controller.setFlowRate(5)).rejects.toThrow(VerificationError);
        });

        test('raises a rejection on "?"', async () => {
            replies['AS5.00'] = '?';
            await expect(controller.setFlowRate(5)).rejects.toThrow(DeviceRejectionError);
        });
    });

    describe('control point', () => {
        test('readControlPoint decodes and caches register 122', async () => {
            replies.AR122 = 'A   00122 = 39';
            await expect(controller.readControlPoint()).resolves.toBe('diff_pressure');
            expect(controller.controlPoint).toBe('diff_pressure');
        });

        test('readControlPoint resolves to null without an answer', async () => {
            await expect(controller.readControlPoint()).resolves.toBeNull();
            expect(controller.controlPoint).toBeNull();
        });

        test('writeControlPoint validates the name', async () => {
            await expect(controller.writeControlPoint('bogus')).rejects.toThrow(ValidationError);
            expect(link.written).toEqual([]);
        });

        test('writeControlPoint keeps the cache on a bad echo', async () => {
            controller.controlPoint = 'mass_flow';
            replies['AW122=36'] = 'A   00122 = 37';
            await expect(controller.writeControlPoint('vol_flow')).rejects.toThrow(VerificationError);
            expect(controller.controlPoint).toBe('mass_flow');
        });

        test('writeControlPoint caches the new point', async () => {
            replies['AW122=38'] = 'A   00122 = 38';
            await controller.writeControlPoint('gauge_pressure');
            expect(controller.controlPoint).toBe('gauge_pressure');
        });
    });

    describe('setGas', () => {
        test('writes the gas index and verifies the low nine bits', async () => {
            replies['A$$W46=8'] = 'A   046 = 8';
            replies['A$$R46'] = 'A   046 = 520';
            await controller.setGas('N2');
            expect(link.written).toEqual(['A$$W46=8', 'A$$R46']);
        });

        test('selects a mix by number', async () => {
            replies['A$$W46=236'] = 'A   046 = 236';
            replies['A$$R46'] = 'A   046 = 236';
            await expect(controller.setGas(236)).resolves.toBeUndefined();
        });

        test('fails when the read-back differs', async () => {
            replies['A$$W46=0'] = 'A   046 = 0';
            replies['A$$R46'] = 'A   046 = 8';
            await expect(controller.setGas('Air')).rejects.toThrow('Could not set gas: requested 0, device reports 8');
        });

        test('rejects unknown gases before sending', async () => {
            await expect(controller.setGas('Unobtainium')).rejects.toThrow('Unobtainium not supported!');
            await expect(controller.setGas(600)).rejects.toThrow(ValidationError);
            await expect(controller.setGas(1.5)).rejects.toThrow(ValidationError);
            expect(link.written).toEqual([]);
        });
    });

    describe('createMix', () => {
        test('sends the mix after checking firmware', async () => {
            replies.AVE = '8v17.0-R23 Nov 30 2016,16:04:20';
            replies['A GM MYMIX 236 50 8 50 11'] = 'A 236 50.00 N2 50.00 O2';
            await controller.createMix(236, 'MYMIX', { N2: 50, O2: 50 });
            expect(link.written).toEqual(['AVE', 'A GM MYMIX 236 50 8 50 11']);
        });

        test('refuses firmware older than 5v', async () => {
            replies.AVE = '4v01';
            await expect(controller.createMix(236, 'MYMIX', { N2: 50, O2: 50 })).rejects.toThrow(UnsupportedFirmwareError);
            expect(link.written).toEqual(['AVE']);
        });

        test('a rejected firmware query stops the mix and is not cached', async () => {
            replies.AVE = '?';
            await expect(controller.createMix(236, 'MYMIX', { N2: 100 })).rejects.toThrow('Device rejected read firmware version (command: "AVE")');
            expect(link.written).toEqual(['AVE']);

            replies.AVE = '8v17.0-R23';
            await expect(controller.readFirmwareVersion()).resolves.toBe('8v17.0-R23');
            expect(link.written).toEqual(['AVE', 'AVE']);
        });

        test('refuses when the firmware cannot be read', async () => {
            await expect(controller.createMix(236, 'MYMIX', { N2: 100 })).rejects.toThrow('Firmware "unknown" does not support COMPOSER gas mixes');
        });

        test('validates arguments before any command', async () => {
            await expect(controller.createMix(235, 'MYMIX', { N2: 100 })).rejects.toThrow('Mix number must be between 236-255!');
            await expect(controller.createMix(236, 'MY MIX', { N2: 100 })).rejects.toThrow(ValidationError);
            await expect(controller.createMix(236, 'MYMIX', {})).rejects.toThrow(ValidationError);
            await expect(controller.createMix(256, 'MYMIX', { N2: 100 })).rejects.toThrow('Mix number must be between 236-255!');
            await expect(controller.createMix(236, 'MYMIX', { N2: 50, O2: 40 })).rejects.toThrow('Percentages of gas mix must add to 100%!');
            await expect(controller.createMix(236, 'MYMIX', { N2: 50, O2: 49 })).rejects.toThrow('Percentages of gas mix must add to 100%!');
            await expect(controller.createMix(236, 'MYMIX', { N2: 50, O2: 51 })).rejects.toThrow('Percentages of gas mix must add to 100%!');
            await expect(controller.createMix(236, 'MYMIX', { Xx: 100 })).rejects.toThrow('Xx not supported!');
            expect(link.written).toEqual([]);
        });

        test('raises a rejection on "?"', async () => {
            replies.AVE = '8v17.0-R23';
            replies['A GM MYMIX 255 100 8'] = '?';
            await expect(controller.createMix(255, 'MYMIX', { N2: 100 })).rejects.toThrow(DeviceRejectionError);
        });
    });

    describe('deleteMix', () => {
        test('sends GD with the slot', async () => {
            replies.AGD240 = 'A';
            await controller.deleteMix(240);
            expect(link.written).toEqual(['AGD240']);
        });

        test('validates the slot', async () => {
            await expect(controller.deleteMix(300)).rejects.toThrow(ValidationError);
            await expect(controller.deleteMix(256)).rejects.toThrow(ValidationError);
            await expect(controller.deleteMix(235)).rejects.toThrow(ValidationError);
            expect(link.written).toEqual([]);
        });
    });

    describe('simple commands', () => {
        test.each([
            ['lock', 'A$$L'],
            ['unlock', 'A$$U'],
            ['tarePressure', 'A$$PC'],
            ['tareVolumetric', 'A$$V'],
            ['resetTotalizer', 'AT'],
            ['hold', 'A$$H'],
            ['cancelHold', 'A$$C']
        ] as const)('%s sends %s', async (method, command) => {
            replies[command] = 'A +014.70 +025.00 +000.00 +000.00 +000.00 N2';
            await controller[method]();
            expect(link.written).toEqual([command]);
        });

        test('a "?" reply is a rejection', async () => {
            replies['A$$H'] = '?';
            await expect(controller.hold()).rejects.toThrow('Device rejected hold valve (command: "A$$H")');
        });
    });

    describe('PID', () => {
        test('readPID reads loop type then P, D and I', async () => {
            replies['A$$r85'] = 'A   085 = 2';
            replies['A$$r21'] = 'A   021 = 4000';
            replies['A$$r22'] = 'A 022 = 800';
            replies['A$$r23'] = 'A 023 = 100';
            await expect(controller.readPID()).resolves.toEqual({ loopType: 'PD2I', P: 4000, D: 800, I: 100 });
            expect(link.written).toEqual(['A$$r85', 'A$$r21', 'A$$r22', 'A$$r23']);
        });

        test('readPID maps both low loop codes to PD/PDF', async () => {
            replies['A$$r85'] = 'A   085 = 0';
            replies['A$$r21'] = 'A   021 = 1';
            replies['A$$r22'] = 'A   022 = 2';
            replies['A$$r23'] = 'A   023 = 3';
            const pid = await controller.readPID();
            expect(pid?.loopType).toBe('PD/PDF');
        });

        test('readPID rejects an unknown loop type', async () => {
            replies['A$$r85'] = 'A   085 = 5';
            await expect(controller.readPID()).rejects.toThrow(ProtocolError);
        });

        test('readPID resolves to null on silence', async () => {
            await expect(controller.readPID()).resolves.toBeNull();
        });

        test('writePID writes only the supplied values in register order', async () => {
            replies['A$$w85=2'] = 'A   085 = 2';
            replies['A$$w21=100'] = 'A   021 = 100';
            replies['A$$w22=20'] = 'A   022 = 20';
            await controller.writePID({ p: 100, d: 20, loopType: 'PD2I' });
            expect(link.written).toEqual(['A$$w85=2', 'A$$w21=100', 'A$$w22=20']);
        });

        test('writePID validates before sending', async () => {
            await expect(controller.writePID({ loopType: 'PID' })).rejects.toThrow('Loop type must be PD/PDF or PD2I.');
            await expect(controller.writePID({ p: NaN })).rejects.toThrow(ValidationError);
            expect(link.written).toEqual([]);
        });
    });
});
