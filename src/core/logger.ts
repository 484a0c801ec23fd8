/**
 * Console logging with a bracketed component prefix.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * `toStderr` sends info lines to stderr too, keeping stdout for data
 */
export function createLogger(component: string, toStderr = false): Logger {
  const prefix = `[${component}]`;
  return {
    info: message => (toStderr ? console.error : console.log)(`${prefix} ${message}`),
    warn: message => console.warn(`${prefix} ${message}`),
    error: message => console.error(`${prefix} ${message}`)
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {}
};
