export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export function createConsoleLogger(scope: string): Logger {
  return {
    info: (message) => console.log(`[${scope}] ${message}`),
    warn: (message) => console.warn(`[${scope}] ${message}`),
  };
}
