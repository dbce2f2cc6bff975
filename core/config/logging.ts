import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Default level based on environment
  defaultLevel: 'warn',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    policy: { level: 'warn' },
    environment: { level: 'warn' },
    script: { level: 'warn' },
    loop: { level: 'warn' },
    host: { level: 'warn' }
  }
} as const;

export type LoggerService = keyof typeof loggingConfig.services;
