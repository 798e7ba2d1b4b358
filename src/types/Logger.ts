/** Where pipeline progress goes; console by default, a stub in tests */
export type Logger = Pick<Console, 'log' | 'warn'>;
