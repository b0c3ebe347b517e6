import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { TelemetryChannel } from './telemetry-channel';
import { parseTreadmillNotificationData } from './treadmill-notification-data-parser';
import type { TreadmillDataFields } from './treadmill-notification-data-parser';
import { EMPTY_TELEMETRY_SNAPSHOT } from './treadmill-telemetry';
import type { TelemetrySnapshot } from './treadmill-telemetry';

export type NotificationPumpOptions = {
  signal: AbortSignal;
  logger?: Logger;
  onSnapshot?: (snapshot: TelemetrySnapshot) => void;
};

export function applyTreadmillData(previous: TelemetrySnapshot, fields: TreadmillDataFields): TelemetrySnapshot {
  return Object.freeze({
    speed: fields.speedKmh ?? previous.speed,
    distance: fields.distanceInMeters ?? previous.distance,
    calories: fields.totalEnergyKcal ?? previous.calories,
    elapsedSeconds: fields.elapsedSeconds ?? previous.elapsedSeconds,
  });
}

/**
 * Decodes notifications and hands the resulting snapshots to `channel`,
 * waiting whenever the channel is full.
 */
export async function pumpNotifications(
  notifications: AsyncIterable<Buffer>,
  channel: TelemetryChannel<TelemetrySnapshot>,
  { signal, logger = silentLogger, onSnapshot }: NotificationPumpOptions,
): Promise<void> {
  let snapshot = EMPTY_TELEMETRY_SNAPSHOT;

  for await (const notification of notifications) {
    if (signal.aborted) {
      return;
    }

    const fields = parseTreadmillNotificationData(notification);

    if (!fields) {
      logger.warn(`Dropped malformed treadmill notification: ${notification.toString('hex')}`);
      continue;
    }

    snapshot = applyTreadmillData(snapshot, fields);
    onSnapshot?.(snapshot);

    if (!await channel.put(snapshot, signal)) {
      return;
    }
  }
}
