import type { TreadmillCommands } from './device-controller';
import { describeError } from './errors';
import type { Logger } from './logger';
import { silentLogger } from './logger';

export type ControlIntent = 'START' | 'STOP' | 'INCREASE_SPEED' | 'DECREASE_SPEED';

export const DEFAULT_SPEED_STEPS: SpeedSteps = Object.freeze({
  increase: 2,
  decrease: 1,
});

/**
 * Step magnitudes in controller speed units. The two directions are
 * configured separately and need not match.
 */
export type SpeedSteps = Readonly<{
  increase: number;
  decrease: number;
}>;

export type CommandOutcome
  = { intent: ControlIntent; ok: true }
  | { intent: ControlIntent; ok: false; error: unknown };

export type CommandFeedbackListener = (outcome: CommandOutcome) => void;

const INTENT_LABELS: Record<ControlIntent, string> = {
  START: 'Start',
  STOP: 'Stop',
  INCREASE_SPEED: 'Speed up',
  DECREASE_SPEED: 'Speed down',
};

export function describeOutcome(outcome: CommandOutcome): string {
  const label = INTENT_LABELS[outcome.intent];

  return outcome.ok ? `${label}: ok` : `${label} failed: ${describeError(outcome.error)}`;
}

export class CommandDispatcher {
  private feedbackListeners: CommandFeedbackListener[] = [];
  private logger: Logger;

  constructor(
    private controller: TreadmillCommands,
    private steps: SpeedSteps = DEFAULT_SPEED_STEPS,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger;
  }

  addFeedbackListener(listener: CommandFeedbackListener) {
    this.feedbackListeners.push(listener);
  }

  removeFeedbackListener(listener: CommandFeedbackListener) {
    const listenerIndex = this.feedbackListeners.indexOf(listener);

    if (listenerIndex === -1) {
      return;
    }

    this.feedbackListeners.splice(listenerIndex, 1);
  }

  async dispatch(intent: ControlIntent): Promise<CommandOutcome> {
    let outcome: CommandOutcome;

    try {
      await this.invoke(intent);
      outcome = { intent, ok: true };
    } catch (error) {
      outcome = { intent, ok: false, error };
    }

    // with a listener attached the failure is shown there instead
    if (!outcome.ok && this.feedbackListeners.length === 0) {
      this.logger.error(describeOutcome(outcome));
    }

    this.feedbackListeners.forEach(listener => {
      try {
        listener(outcome);
      } catch (error) {
        this.logger.error(`Failed to report ${INTENT_LABELS[intent]} outcome: ${describeError(error)}`);
      }
    });

    return outcome;
  }

  private invoke(intent: ControlIntent): Promise<void> {
    switch (intent) {
      case 'START':
        return this.controller.start();
      case 'STOP':
        return this.controller.stop();
      case 'INCREASE_SPEED':
        return this.controller.setSpeed(this.steps.increase);
      case 'DECREASE_SPEED':
        return this.controller.setSpeed(-this.steps.decrease);
    }
  }
}
