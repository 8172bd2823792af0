export type LogLevel = 'spam' | 'debug' | 'info' | 'warn' | 'error' | 'none';
