export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

// stdout belongs to the dashboard
const diagnostics = new console.Console({ stdout: process.stderr, stderr: process.stderr });

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    info: (message, ...details) => diagnostics.info(prefix, message, ...details),
    warn: (message, ...details) => diagnostics.warn(prefix, message, ...details),
    error: (message, ...details) => diagnostics.error(prefix, message, ...details),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
