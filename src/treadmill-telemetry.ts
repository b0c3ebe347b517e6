export type TelemetrySnapshot = Readonly<{
  speed: number;
  distance: number;
  calories: number;
  elapsedSeconds: number;
}>;

export const EMPTY_TELEMETRY_SNAPSHOT: TelemetrySnapshot = Object.freeze({
  speed: 0,
  distance: 0,
  calories: 0,
  elapsedSeconds: 0,
});

export type DerivedDisplay = Readonly<{
  speedText: string;
  distanceText: string;
  caloriesText: string;
  durationText: string;
  stepsEstimate: number;
}>;

export type TreadmillSessionState = 'DISCONNECTED' | 'IDLE' | 'RUNNING';
