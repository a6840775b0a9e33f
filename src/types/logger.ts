/** Logger callback for key-handling diagnostic events. */
export type KeyLogger = (level: 'debug' | 'warn' | 'error', message: string, data?: unknown) => void;
