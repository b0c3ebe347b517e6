import type { TelemetryChannel } from './telemetry-channel';
import type { TelemetrySnapshot } from './treadmill-telemetry';

export interface DeviceController {
  start(): Promise<void>;
  stop(): Promise<void>;
  /**
   * `step` is a signed number of speed units; the controller decides what a
   * unit is worth.
   */
  setSpeed(step: number): Promise<void>;
  /**
   * Pushes a snapshot into `channel` for every notification until `signal`
   * aborts. Resolves (never rejects) on cancellation.
   */
  subscribe(channel: TelemetryChannel<TelemetrySnapshot>, signal: AbortSignal): Promise<void>;
}

export type TreadmillCommands = Pick<DeviceController, 'start' | 'stop' | 'setSpeed'>;
