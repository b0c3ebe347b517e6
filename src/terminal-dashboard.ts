import { clearScreenDown, cursorTo } from 'readline';
import type { Writable } from 'stream';

import type { FeedbackLevel, RenderSink } from './render-sink';
import type { DerivedDisplay } from './treadmill-telemetry';

const INITIAL_DISPLAY: DerivedDisplay = {
  speedText: '00.00',
  distanceText: '0000',
  caloriesText: '0000',
  durationText: '0:00:00',
  stepsEstimate: 0,
};

const KEY_LEGEND = '[s] start  [x] stop  [+] faster  [-] slower  [q] quit';

export function formatDashboard(display: DerivedDisplay, feedback: string): string[] {
  return [
    `Duration  ${display.durationText}`,
    `Speed     ${display.speedText} km/h`,
    `Calories  ${display.caloriesText} kcal`,
    `Distance  ${display.distanceText} m`,
    `Steps     ${display.stepsEstimate}`,
    '',
    KEY_LEGEND,
    feedback,
  ];
}

export class TerminalDashboard implements RenderSink {
  private display = INITIAL_DISPLAY;
  private feedback = '';

  constructor(private output: Writable) {}

  publish(display: DerivedDisplay) {
    this.display = display;
    this.draw();
  }

  notify(message: string, level: FeedbackLevel) {
    this.feedback = level === 'error' ? `! ${message}` : message;
    this.draw();
  }

  draw() {
    cursorTo(this.output, 0, 0);
    clearScreenDown(this.output);
    this.output.write(`${formatDashboard(this.display, this.feedback).join('\n')}\n`);
  }
}
