import assert from 'node:assert/strict';
import { Writable } from 'stream';
import { describe, it } from 'vitest';
import { TerminalDashboard, formatDashboard } from '../terminal-dashboard';
import { flush } from './helpers';

const display = {
  speedText: '05.20',
  distanceText: '0120',
  caloriesText: '0045',
  durationText: '1:02:05',
  stepsEstimate: 165,
};

const captureStream = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, chunks };
};

describe('terminal-dashboard', () => {
  it('lays out the five telemetry fields', () => {
    assert.deepEqual(formatDashboard(display, '').slice(0, 5), [
      'Duration  1:02:05',
      'Speed     05.20 km/h',
      'Calories  0045 kcal',
      'Distance  0120 m',
      'Steps     165',
    ]);
  });

  it('redraws the screen on every update', async () => {
    const { stream, chunks } = captureStream();
    const dashboard = new TerminalDashboard(stream);

    dashboard.publish(display);
    await flush();

    const frame = chunks[chunks.length - 1];
    assert.equal(frame, `${formatDashboard(display, '').join('\n')}\n`);
  });

  it('marks error feedback', async () => {
    const { stream, chunks } = captureStream();
    const dashboard = new TerminalDashboard(stream);

    dashboard.notify('Start failed: not connected', 'error');
    await flush();

    const lines = chunks[chunks.length - 1].split('\n');
    assert.equal(lines[lines.length - 2], '! Start failed: not connected');
  });
});
