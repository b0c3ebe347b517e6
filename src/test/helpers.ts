import type { Logger } from '../logger';

export const flush = (): Promise<void> => new Promise(resolve => setImmediate(resolve));

export async function isSettled(promise: Promise<unknown>): Promise<boolean> {
  let settled = false;
  promise.then(
    () => {
      settled = true;
    },
    () => {
      settled = true;
    },
  );
  await flush();
  return settled;
}

export type RecordingLogger = Logger & {
  messages: { level: 'info' | 'warn' | 'error'; message: string }[];
};

export function recordingLogger(): RecordingLogger {
  const messages: RecordingLogger['messages'] = [];

  return {
    messages,
    info: message => messages.push({ level: 'info', message }),
    warn: message => messages.push({ level: 'warn', message }),
    error: message => messages.push({ level: 'error', message }),
  };
}
