/** Minimal logging surface used by transports; `console` satisfies it. */
export type Logger = Pick<Console, 'debug' | 'warn'>;

/** Logger used when none is configured. */
export const defaultLogger: Logger = console;
