import { ConfigurationError } from './errors';

export class BluetoothDeviceAddress {
  private constructor(private value: string) {}

  static fromString(value: string) {
    const trimmed = value.trim();
    const addressHexCodes = trimmed.split(':');

    if (
      addressHexCodes.length !== 6 ||
      addressHexCodes.some(hexCode => !/^[0-9a-fA-F]{2}$/.test(hexCode))
    ) {
      throw new ConfigurationError(
        `Expected Bluetooth device address like: "FF:FF:FF:FF:FF:FF", got: ${JSON.stringify(value)}`,
        { context: { value } },
      );
    }

    return new BluetoothDeviceAddress(trimmed.toUpperCase());
  }

  toString() {
    return this.value;
  }
}
