// src/log.ts

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

// Everything goes to stderr: stdout carries CLI JSON and the MCP stdio stream.
export function createLogger(options: { debug?: boolean } = {}): Logger {
  return {
    debug: options.debug
      ? (message) => console.error(`[schema-depot] ${message}`)
      : () => {},
    info: (message) => console.error(`[schema-depot] ${message}`),
    warn: (message) => console.error(`[schema-depot] warning: ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};
