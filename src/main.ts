#!/usr/bin/env node
import { CommandDispatcher, describeOutcome } from './command-dispatcher';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { ConfigurationError, describeError } from './errors';
import { listenForKeys } from './keyboard-controls';
import { createLogger } from './logger';
import { TelemetryChannel } from './telemetry-channel';
import { TelemetryConsumerLoop } from './telemetry-consumer-loop';
import { TerminalDashboard } from './terminal-dashboard';
import { TreadmillConnection } from './treadmill-connection';
import type { TelemetrySnapshot } from './treadmill-telemetry';

const logger = createLogger('treadmill');

async function run(config: AppConfig) {
  const channel = new TelemetryChannel<TelemetrySnapshot>();

  logger.info(`Connecting to ${config.address.toString()}`);
  const connection = await TreadmillConnection.forAddress(config.address, {
    speedUnitKmh: config.speedUnitKmh,
    maxSpeedKmh: config.maxSpeedKmh,
    logger: createLogger('connection'),
  });

  const subscription = new AbortController();
  const producer = connection.subscribe(channel, subscription.signal).catch(error => {
    logger.error(`Telemetry subscription ended: ${describeError(error)}`);
  });

  const dashboard = new TerminalDashboard(process.stdout);
  const consumer = new TelemetryConsumerLoop(channel, dashboard, config.calibration, createLogger('consumer'));
  const dispatcher = new CommandDispatcher(connection, config.speedSteps, createLogger('commands'));
  dispatcher.addFeedbackListener(outcome => dashboard.notify(describeOutcome(outcome), outcome.ok ? 'info' : 'error'));

  const teardown = new AbortController();
  const onSignal = () => teardown.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  dashboard.draw();
  consumer.start();

  try {
    await listenForKeys(process.stdin, {
      onIntent: intent => {
        void dispatcher.dispatch(intent);
      },
    }, teardown.signal);
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);

    await consumer.cancel();
    subscription.abort();
    await producer;

    logger.info(`Session ended while ${connection.state.toLowerCase()}`);

    await connection.disconnect().catch(error => {
      logger.warn(`Failed to disconnect cleanly: ${describeError(error)}`);
    });
    connection.destroy();
  }
}

async function main() {
  let config: AppConfig;

  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      process.exitCode = 1;
      return;
    }

    throw error;
  }

  await run(config);
}

main().catch(error => {
  logger.error(describeError(error));
  process.exitCode = 1;
});
