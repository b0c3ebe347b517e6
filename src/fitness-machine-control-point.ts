export const FITNESS_MACHINE_SERVICE_UUID = '00001826-0000-1000-8000-00805f9b34fb';
export const TREADMILL_DATA_CHARACTERISTIC_UUID = '00002acd-0000-1000-8000-00805f9b34fb';
export const CONTROL_POINT_CHARACTERISTIC_UUID = '00002ad9-0000-1000-8000-00805f9b34fb';

const OP_REQUEST_CONTROL = 0x00;
const OP_SET_TARGET_SPEED = 0x02;
const OP_START_OR_RESUME = 0x07;
const OP_STOP_OR_PAUSE = 0x08;

const STOP_PARAMETER = 0x01;
const MAX_TARGET_SPEED_CENTI_KMH = 0xffff;

export function encodeRequestControl(): Buffer {
  return Buffer.from([OP_REQUEST_CONTROL]);
}

export function encodeStart(): Buffer {
  return Buffer.from([OP_START_OR_RESUME]);
}

export function encodeStop(): Buffer {
  return Buffer.from([OP_STOP_OR_PAUSE, STOP_PARAMETER]);
}

export function encodeSetTargetSpeed(speedKmh: number): Buffer {
  const centiKmh = Math.min(Math.max(Math.round(speedKmh * 100), 0), MAX_TARGET_SPEED_CENTI_KMH);
  const command = Buffer.alloc(3);

  command.writeUInt8(OP_SET_TARGET_SPEED, 0);
  command.writeUInt16LE(centiKmh, 1);

  return command;
}
