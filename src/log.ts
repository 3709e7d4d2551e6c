/** Components log through the console unless handed something else. */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
