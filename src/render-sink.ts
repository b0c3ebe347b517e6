import type { DerivedDisplay } from './treadmill-telemetry';

export type FeedbackLevel = 'info' | 'error';

export interface RenderSink {
  publish(display: DerivedDisplay): void;
  notify(message: string, level: FeedbackLevel): void;
}
