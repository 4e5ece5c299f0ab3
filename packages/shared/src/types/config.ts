import type { AuthConfig } from './auth.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  port: number;
  host: string;
}

export interface DatabaseConfig {
  path: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface TallyConfig {
  server: ServerConfig;
  auth: AuthConfig;
  database: DatabaseConfig;
  logging: LoggingConfig;
}
