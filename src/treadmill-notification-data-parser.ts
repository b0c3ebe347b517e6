// FTMS Treadmill Data (0x2ACD) flag bits
const MORE_DATA = 1 << 0;
const AVERAGE_SPEED = 1 << 1;
const TOTAL_DISTANCE = 1 << 2;
const INCLINATION_AND_RAMP_ANGLE = 1 << 3;
const ELEVATION_GAIN = 1 << 4;
const INSTANTANEOUS_PACE = 1 << 5;
const AVERAGE_PACE = 1 << 6;
const EXPENDED_ENERGY = 1 << 7;
const HEART_RATE = 1 << 8;
const METABOLIC_EQUIVALENT = 1 << 9;
const ELAPSED_TIME = 1 << 10;
const REMAINING_TIME = 1 << 11;
const FORCE_AND_POWER = 1 << 12;

const ENERGY_NOT_AVAILABLE = 0xffff;

export type TreadmillDataFields = {
  speedKmh?: number;
  averageSpeedKmh?: number;
  distanceInMeters?: number;
  inclinationPercent?: number;
  rampAngleDegrees?: number;
  positiveElevationGainMeters?: number;
  negativeElevationGainMeters?: number;
  instantaneousPaceKmPerMinute?: number;
  averagePaceKmPerMinute?: number;
  totalEnergyKcal?: number;
  heartRateBpm?: number;
  metabolicEquivalent?: number;
  elapsedSeconds?: number;
  remainingSeconds?: number;
  forceOnBeltNewtons?: number;
  powerOutputWatts?: number;
};

class FieldReader {
  private offset = 0;

  constructor(private data: Buffer) {}

  has(byteLength: number) {
    return this.offset + byteLength <= this.data.length;
  }

  uint8() {
    const value = this.data.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  uint16() {
    const value = this.data.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  int16() {
    const value = this.data.readInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  uint24() {
    const value = this.data.readUIntLE(this.offset, 3);
    this.offset += 3;
    return value;
  }
}

/**
 * Decodes one Treadmill Data notification. Returns `undefined` when the
 * payload is shorter than its flags announce.
 */
export function parseTreadmillNotificationData(data: Buffer): TreadmillDataFields | undefined {
  const reader = new FieldReader(data);

  if (!reader.has(2)) {
    return undefined;
  }

  const flags = reader.uint16();
  const fields: TreadmillDataFields = {};

  if (!(flags & MORE_DATA)) {
    if (!reader.has(2)) return undefined;
    fields.speedKmh = reader.uint16() / 100;
  }

  if (flags & AVERAGE_SPEED) {
    if (!reader.has(2)) return undefined;
    fields.averageSpeedKmh = reader.uint16() / 100;
  }

  if (flags & TOTAL_DISTANCE) {
    if (!reader.has(3)) return undefined;
    fields.distanceInMeters = reader.uint24();
  }

  if (flags & INCLINATION_AND_RAMP_ANGLE) {
    if (!reader.has(4)) return undefined;
    fields.inclinationPercent = reader.int16() / 10;
    fields.rampAngleDegrees = reader.int16() / 10;
  }

  if (flags & ELEVATION_GAIN) {
    if (!reader.has(4)) return undefined;
    fields.positiveElevationGainMeters = reader.uint16() / 10;
    fields.negativeElevationGainMeters = reader.uint16() / 10;
  }

  if (flags & INSTANTANEOUS_PACE) {
    if (!reader.has(1)) return undefined;
    fields.instantaneousPaceKmPerMinute = reader.uint8() / 10;
  }

  if (flags & AVERAGE_PACE) {
    if (!reader.has(1)) return undefined;
    fields.averagePaceKmPerMinute = reader.uint8() / 10;
  }

  if (flags & EXPENDED_ENERGY) {
    // total energy, energy per hour, energy per minute
    if (!reader.has(5)) return undefined;
    const totalEnergy = reader.uint16();
    reader.uint16();
    reader.uint8();

    if (totalEnergy !== ENERGY_NOT_AVAILABLE) {
      fields.totalEnergyKcal = totalEnergy;
    }
  }

  if (flags & HEART_RATE) {
    if (!reader.has(1)) return undefined;
    fields.heartRateBpm = reader.uint8();
  }

  if (flags & METABOLIC_EQUIVALENT) {
    if (!reader.has(1)) return undefined;
    fields.metabolicEquivalent = reader.uint8() / 10;
  }

  if (flags & ELAPSED_TIME) {
    if (!reader.has(2)) return undefined;
    fields.elapsedSeconds = reader.uint16();
  }

  if (flags & REMAINING_TIME) {
    if (!reader.has(2)) return undefined;
    fields.remainingSeconds = reader.uint16();
  }

  if (flags & FORCE_AND_POWER) {
    if (!reader.has(4)) return undefined;
    fields.forceOnBeltNewtons = reader.int16();
    fields.powerOutputWatts = reader.int16();
  }

  return fields;
}
