import { on } from 'events';
import { createBluetooth } from 'node-ble';
import type * as NodeBle from 'node-ble';

import type { BluetoothDeviceAddress } from './bluetooth-device-address';
import type { DeviceController } from './device-controller';
import { TransportError, describeError, isAbortError } from './errors';
import {
  CONTROL_POINT_CHARACTERISTIC_UUID,
  FITNESS_MACHINE_SERVICE_UUID,
  TREADMILL_DATA_CHARACTERISTIC_UUID,
  encodeRequestControl,
  encodeSetTargetSpeed,
  encodeStart,
  encodeStop,
} from './fitness-machine-control-point';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { pumpNotifications } from './notification-pump';
import type { TelemetryChannel } from './telemetry-channel';
import type { TelemetrySnapshot, TreadmillSessionState } from './treadmill-telemetry';

export type TreadmillConnectionOptions = {
  speedUnitKmh: number;
  maxSpeedKmh: number;
  logger?: Logger;
};

type TreadmillCharacteristics = {
  treadmillData: NodeBle.GattCharacteristic;
  controlPoint: NodeBle.GattCharacteristic;
};

export function nextTargetSpeed(currentKmh: number, step: number, { speedUnitKmh, maxSpeedKmh }: TreadmillConnectionOptions) {
  const target = Math.round((currentKmh + step * speedUnitKmh) * 100) / 100;

  return Math.min(Math.max(target, 0), maxSpeedKmh);
}

export class TreadmillConnection implements DeviceController {
  private bluetoothInstance: ReturnType<typeof createBluetooth>;
  private treadmillDevice: NodeBle.Device | null = null;
  private characteristics: TreadmillCharacteristics | null = null;

  private sessionState: TreadmillSessionState = 'DISCONNECTED';
  private speedKmh = 0;
  private logger: Logger;

  private constructor(private options: TreadmillConnectionOptions) {
    this.bluetoothInstance = createBluetooth();
    this.logger = options.logger ?? silentLogger;
  }

  get state() {
    return this.sessionState;
  }

  private async connect(deviceAddress: BluetoothDeviceAddress): Promise<this> {
    const adapter = await this.bluetoothInstance.bluetooth.defaultAdapter();

    if (!await adapter.isDiscovering()) {
      await adapter.startDiscovery();
    }

    this.treadmillDevice = await adapter.waitDevice(deviceAddress.toString());
    await this.treadmillDevice.connect();
    this.logger.info(`Connected to ${deviceAddress.toString()}`);

    this.treadmillDevice.on('disconnect', () => {
      this.sessionState = 'DISCONNECTED';
      this.characteristics = null;
      this.logger.warn('Treadmill disconnected');
    });

    const gattServer = await this.treadmillDevice.gatt();
    const service = await gattServer.getPrimaryService(FITNESS_MACHINE_SERVICE_UUID);
    this.characteristics = {
      treadmillData: await service.getCharacteristic(TREADMILL_DATA_CHARACTERISTIC_UUID),
      controlPoint: await service.getCharacteristic(CONTROL_POINT_CHARACTERISTIC_UUID),
    };
    this.sessionState = 'IDLE';

    await this.writeControlPoint(encodeRequestControl(), 'request control');

    return this;
  }

  async start() {
    await this.writeControlPoint(encodeStart(), 'start the treadmill');
    this.sessionState = 'RUNNING';
  }

  async stop() {
    await this.writeControlPoint(encodeStop(), 'stop the treadmill');
    this.sessionState = 'IDLE';
  }

  async setSpeed(step: number) {
    const target = nextTargetSpeed(this.speedKmh, step, this.options);

    await this.writeControlPoint(encodeSetTargetSpeed(target), `set speed to ${target.toFixed(2)} km/h`);
    this.speedKmh = target;
  }

  async subscribe(channel: TelemetryChannel<TelemetrySnapshot>, signal: AbortSignal) {
    const { treadmillData } = this.requireCharacteristics('subscribe to telemetry');

    try {
      await treadmillData.startNotifications();
    } catch (error) {
      throw new TransportError('Failed to subscribe to treadmill data', { cause: error });
    }

    try {
      await pumpNotifications(this.notifications(treadmillData, signal), channel, {
        signal,
        logger: this.logger,
        onSnapshot: snapshot => {
          this.speedKmh = snapshot.speed;
        },
      });
    } finally {
      await treadmillData.stopNotifications().catch(error => {
        this.logger.warn(`Failed to stop treadmill notifications: ${describeError(error)}`);
      });
    }
  }

  private async *notifications(characteristic: NodeBle.GattCharacteristic, signal: AbortSignal): AsyncGenerator<Buffer> {
    try {
      for await (const args of on(characteristic, 'valuechanged', { signal })) {
        const [value]: unknown[] = args;

        if (Buffer.isBuffer(value)) {
          yield value;
        }
      }
    } catch (error) {
      if (!isAbortError(error)) {
        throw error;
      }
    }
  }

  private requireCharacteristics(action: string): TreadmillCharacteristics {
    if (this.sessionState === 'DISCONNECTED' || !this.characteristics) {
      throw new TransportError(`Cannot ${action}: treadmill is not connected`);
    }

    return this.characteristics;
  }

  private async writeControlPoint(command: Buffer, action: string) {
    const { controlPoint } = this.requireCharacteristics(action);

    try {
      await controlPoint.writeValue(command);
    } catch (error) {
      throw new TransportError(`Failed to ${action}`, {
        cause: error,
        context: { command: command.toString('hex') },
      });
    }
  }

  async disconnect() {
    this.sessionState = 'DISCONNECTED';
    this.characteristics = null;

    if (this.treadmillDevice) {
      const device = this.treadmillDevice;
      this.treadmillDevice = null;
      await device.disconnect();
    }
  }

  destroy() {
    this.bluetoothInstance.destroy();
  }

  static forAddress(deviceAddress: BluetoothDeviceAddress, options: TreadmillConnectionOptions): Promise<TreadmillConnection> {
    const connection = new TreadmillConnection(options);
    return connection.connect(deviceAddress).catch(error => {
      connection.destroy();

      throw new TransportError(`Failed to connect to ${deviceAddress.toString()}`, { cause: error });
    });
  }
}
