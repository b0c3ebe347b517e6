import type { DerivedDisplay, TelemetrySnapshot } from './treadmill-telemetry';

export const DEFAULT_STRIDE_FACTOR = 0.415;

export type StrideCalibration = Readonly<{
  userHeightCm: number;
  strideFactor: number;
}>;

export function deriveDisplay(snapshot: TelemetrySnapshot, calibration: StrideCalibration): DerivedDisplay {
  return Object.freeze({
    speedText: formatSpeed(snapshot.speed),
    distanceText: zeroPad(snapshot.distance, 4),
    caloriesText: zeroPad(snapshot.calories, 4),
    durationText: formatDuration(snapshot.elapsedSeconds),
    stepsEstimate: estimateSteps(snapshot.distance, calibration),
  });
}

export function formatSpeed(speedKmh: number): string {
  return speedKmh.toFixed(2).padStart(5, '0');
}

export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return `${hours}:${zeroPad(minutes, 2)}:${zeroPad(seconds, 2)}`;
}

export function estimateSteps(distanceInMeters: number, { userHeightCm, strideFactor }: StrideCalibration): number {
  const strideInMeters = (userHeightCm / 100) * strideFactor;

  return Math.floor(distanceInMeters / strideInMeters);
}

function zeroPad(value: number, width: number): string {
  return String(Math.trunc(value)).padStart(width, '0');
}
