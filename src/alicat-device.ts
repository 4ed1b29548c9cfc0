import type { Node, NodeAPI, NodeDef, NodeMessageInFlow } from "node-red";
import AutoReader from './auto-reader';
import ConnectionManager from './connection-manager';
import * as CONST from './constants';
import DeviceManager from './device-manager';
import { probe, type DeviceKind } from './discovery';
import { FlowController } from './flow-controller';
import { FlowMeter } from './flow-meter';

interface AlicatNodeConfig extends NodeDef {
    address: string;
    unit: string;
    kind: DeviceKind;
    timeout: string;
    pacing: string;
}

interface AlicatNode extends Node {
    device: FlowMeter;
    pacing: number;
    busy: boolean;
}

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown, field: string): number {
    const n = typeof value === 'string' ? parseFloat(value) : value;
    if (typeof n !== 'number' || isNaN(n)) {
        throw new Error(`${field} must be a number`);
    }
    return n;
}

function optionalNumber(payload: Payload, key: string): number | undefined {
    return payload[key] === undefined ? undefined : toNumber(payload[key], key);
}

function toGases(value: unknown): Record<string, number> {
    if (!isPayload(value)) throw new Error("gases must be an object of gas: percent");
    const gases: Record<string, number> = {};
    for (const [gas, percent] of Object.entries(value)) {
        gases[gas] = toNumber(percent, `gases.${gas}`);
    }
    return gases;
}

/**
 * Run one msg.topic command. Reads return the device state; the rest
 * return what the device reports, or true once the write is verified.
 */
async function execute(device: FlowMeter, topic: string, payload: unknown): Promise<unknown> {
    if (!topic || topic === 'read') return device.read();
    if (topic === 'firmware') return device.readFirmwareVersion();
    if (topic === 'isLocked') return device.isLocked();

    if (!(device instanceof FlowController)) {
        throw new Error(`"${topic}" needs a controller`);
    }

    const args: Payload = isPayload(payload) ? payload : {};
    switch (topic) {
        case 'setFlowRate':
            await device.setFlowRate(toNumber(payload, 'flow rate'));
            break;
        case 'setPressure':
            await device.setPressure(toNumber(payload, 'pressure'));
            break;
        case 'setGas':
            await device.setGas(typeof payload === 'number' ? payload : String(payload));
            break;
        case 'getControlPoint':
            return device.readControlPoint();
        case 'setControlPoint':
            await device.writeControlPoint(String(payload));
            break;
        case 'getPid':
            return device.readPID();
        case 'setPid':
            await device.writePID({
                p: optionalNumber(args, 'p'),
                i: optionalNumber(args, 'i'),
                d: optionalNumber(args, 'd'),
                loopType: args.loopType === undefined ? undefined : String(args.loopType)
            });
            break;
        case 'createMix':
            await device.createMix(toNumber(args.slot, 'slot'), String(args.name ?? ''), toGases(args.gases));
            break;
        case 'deleteMix':
            await device.deleteMix(toNumber(isPayload(payload) ? args.slot : payload, 'slot'));
            break;
        case 'lock': await device.lock(); break;
        case 'unlock': await device.unlock(); break;
        case 'hold': await device.hold(); break;
        case 'cancelHold': await device.cancelHold(); break;
        case 'tarePressure': await device.tarePressure(); break;
        case 'tareVolumetric': await device.tareVolumetric(); break;
        case 'resetTotalizer': await device.resetTotalizer(); break;
        default:
            throw new Error(`Unknown command "${topic}"`);
    }
    return true;
}

export = function (RED: NodeAPI) {
    const connManager = new ConnectionManager();
    const deviceManager = new DeviceManager(RED.settings.userDir || __dirname);

    // --- Admin API ---
    RED.httpAdmin.get('/alicat/devices', RED.auth.needsPermission('alicat.read'), function (req, res) {
        res.json(deviceManager.list());
    });

    RED.httpAdmin.post('/alicat/devices', RED.auth.needsPermission('alicat.write'), function (req, res) {
        try {
            const dev = deviceManager.add(req.body);
            res.json(dev);
        } catch (e) { res.status(400).send(e instanceof Error ? e.message : String(e)); }
    });

    RED.httpAdmin.put('/alicat/devices/:id', RED.auth.needsPermission('alicat.write'), function (req, res) {
        try {
            const dev = deviceManager.update(req.params.id, req.body);
            res.json(dev);
        } catch (e) { res.status(400).send(e instanceof Error ? e.message : String(e)); }
    });

    RED.httpAdmin.delete('/alicat/devices/:id', RED.auth.needsPermission('alicat.write'), function (req, res) {
        const success = deviceManager.delete(req.params.id);
        if (success) res.sendStatus(200);
        else res.sendStatus(404);
    });

    RED.httpAdmin.post('/alicat/probe', RED.auth.needsPermission('alicat.read'), async function (req, res) {
        const address = String(req.body?.address || '');
        const unit = String(req.body?.unit || CONST.DEFAULT_UNIT);
        if (!address) {
            res.status(400).send("Address is required");
            return;
        }
        const kind = await probe(address, { unit, pool: connManager });
        if (kind) {
            deviceManager.upsert({ address, unit, kind });
        }
        res.json({ address, unit, kind });
    });

    function AlicatDeviceNode(this: AlicatNode, config: AlicatNodeConfig) {
        RED.nodes.createNode(this, config);
        const node = this;

        const timeout = parseInt(config.timeout) || CONST.DEFAULT_TIMEOUT;
        const options = { unit: config.unit || CONST.DEFAULT_UNIT, timeout, pool: connManager };

        try {
            node.device = config.kind === 'meter'
                ? new FlowMeter(config.address, options)
                : new FlowController(config.address, options);
        } catch (e) {
            node.error(e instanceof Error ? e.message : String(e));
            node.status({ fill: "red", shape: "ring", text: "invalid config" });
            return;
        }
        node.busy = false;

        let rawPacing = parseFloat(config.pacing || "0");
        if (!isNaN(rawPacing) && rawPacing > 0 && rawPacing < CONST.MIN_PACING_INTERVAL) {
            node.warn(`Auto-read interval ${rawPacing}s is too fast. Enforcing minimum ${CONST.MIN_PACING_INTERVAL}s.`);
            rawPacing = CONST.MIN_PACING_INTERVAL;
        }
        node.pacing = isNaN(rawPacing) ? 0 : rawPacing;

        async function run(topic: string, payload: unknown): Promise<unknown> {
            node.busy = true;
            try {
                return await execute(node.device, topic, payload);
            } finally {
                node.busy = false;
            }
        }

        node.on('input', function (msg: NodeMessageInFlow, send, done) {
            const topic = typeof msg.topic === 'string' ? msg.topic : '';
            const isWrite = topic !== '' && topic !== 'read';
            node.status({ fill: isWrite ? "yellow" : "blue", shape: "dot", text: topic || "read" });

            run(topic, msg.payload)
                .then(result => {
                    if (result === null) {
                        node.status({ fill: "red", shape: "ring", text: "no response" });
                    } else {
                        node.status({ fill: "green", shape: "dot", text: `${topic || "read"} ok` });
                    }
                    msg.payload = result;
                    send(msg);
                    done();
                })
                .catch(err => {
                    node.status({ fill: "red", shape: "ring", text: `${topic || "read"} failed` });
                    done(err instanceof Error ? err : new Error(String(err)));
                });
        });

        const reader = new AutoReader(node.device, {
            intervalMs: node.pacing * 1000,
            isBusy: () => node.busy
        }, {
            onState: (state) => {
                node.status({ fill: "green", shape: "dot", text: "read ok" });
                node.send({ topic: 'read', payload: state });
            },
            onNoResponse: (failures) => {
                node.status({ fill: "red", shape: "ring", text: `no response (${failures}x)` });
            },
            onError: (err, failures, retryIn) => {
                node.warn(`Auto-read failed: ${err instanceof Error ? err.message : String(err)}`);
                node.status({ fill: "red", shape: "ring", text: `retrying in ${Math.round(retryIn / 1000)}s (${failures}x)...` });
            },
            onRecovered: (failures) => {
                node.log(`Auto-read recovered after ${failures} failures`);
            }
        });

        if (node.pacing > 0) {
            node.log(`Auto-read enabled: ${node.pacing}s`);
            reader.start();
        }

        node.on('close', function (done: () => void) {
            reader.stop();
            node.device.close().then(
                () => done(),
                (err) => {
                    node.warn(`Close failed: ${err instanceof Error ? err.message : String(err)}`);
                    done();
                }
            );
        });
    }

    RED.nodes.registerType("alicat-device", AlicatDeviceNode);
}
