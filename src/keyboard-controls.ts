import { emitKeypressEvents } from 'readline';

import type { ControlIntent } from './command-dispatcher';

export type KeyPress = {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
};

export type KeyboardHandlers = {
  onIntent: (intent: ControlIntent) => void;
};

type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export function intentForKey(key: KeyPress): ControlIntent | undefined {
  if (key.ctrl) {
    return undefined;
  }

  switch (key.name ?? key.sequence) {
    case 's':
      return 'START';
    case 'x':
    case 'space':
      return 'STOP';
    case 'up':
      return 'INCREASE_SPEED';
    case 'down':
      return 'DECREASE_SPEED';
  }

  switch (key.sequence) {
    case '+':
    case '=':
      return 'INCREASE_SPEED';
    case '-':
      return 'DECREASE_SPEED';
  }

  return undefined;
}

export function isQuitKey(key: KeyPress): boolean {
  return (key.ctrl === true && key.name === 'c') || key.name === 'q' || key.name === 'escape';
}

/**
 * Routes key presses to `handlers` until a quit key is pressed or `signal`
 * aborts.
 */
export function listenForKeys(input: KeyInput, handlers: KeyboardHandlers, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }

    emitKeypressEvents(input);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(true);
    }
    input.resume();

    const finish = () => {
      input.removeListener('keypress', onKeypress);
      signal.removeEventListener('abort', finish);
      if (input.isTTY && input.setRawMode) {
        input.setRawMode(false);
      }
      input.pause();
      resolve();
    };

    const onKeypress = (_text: string | undefined, key: KeyPress | undefined) => {
      if (!key) {
        return;
      }

      if (isQuitKey(key)) {
        finish();
        return;
      }

      const intent = intentForKey(key);
      if (intent) {
        handlers.onIntent(intent);
      }
    };

    input.on('keypress', onKeypress);
    signal.addEventListener('abort', finish, { once: true });
  });
}
