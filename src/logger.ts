/** Logger accepted by every component that logs. Defaults to `console`. */
export type Logger = Pick<Console, 'log' | 'error' | 'debug'>;
