import { deriveDisplay } from './display-fields';
import type { StrideCalibration } from './display-fields';
import { describeError } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import type { RenderSink } from './render-sink';
import type { TelemetryChannel } from './telemetry-channel';
import type { TelemetrySnapshot } from './treadmill-telemetry';

type ActiveRun = {
  controller: AbortController;
  finished: Promise<void>;
};

/**
 * Sole consumer of the telemetry channel. Starting it again cancels the
 * current run; the new run begins once the old one has returned.
 */
export class TelemetryConsumerLoop {
  private activeRun: ActiveRun | null = null;
  private logger: Logger;

  constructor(
    private channel: TelemetryChannel<TelemetrySnapshot>,
    private sink: RenderSink,
    private calibration: StrideCalibration,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  get running() {
    return this.activeRun !== null;
  }

  start() {
    const previous = this.activeRun;
    previous?.controller.abort();

    const controller = new AbortController();
    const finished = (previous?.finished ?? Promise.resolve()).then(() => this.run(controller.signal));
    const run: ActiveRun = { controller, finished };

    this.activeRun = run;
    void finished.finally(() => {
      if (this.activeRun === run) {
        this.activeRun = null;
      }
    });
  }

  async cancel() {
    const run = this.activeRun;

    if (!run) {
      return;
    }

    this.activeRun = null;
    run.controller.abort();
    await run.finished;
  }

  private async run(signal: AbortSignal) {
    while (!signal.aborted) {
      const next = await this.channel.get(signal);

      if (next.done) {
        return;
      }

      const display = deriveDisplay(next.value, this.calibration);

      try {
        this.sink.publish(display);
      } catch (error) {
        this.logger.error(`Failed to render telemetry: ${describeError(error)}`);
      }
    }
  }
}
