import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration
  files: {
    directory: 'logs',
    mainLog: 'stache.log',
    errorLog: 'error.log',
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    parser: {
      level: 'warn'
    },
    renderer: {
      level: 'warn'
    },
    partials: {
      level: 'warn'
    },
    extractor: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    filesystem: {
      level: 'warn'
    },
    cli: {
      level: 'info'
    }
  }
} as const;

export type LoggedService = keyof typeof loggingConfig.services;
