import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration
  files: {
    directory: 'logs',
    mainLog: 'textblocks.log',
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
    grammar: {
      level: 'warn'
    },
    extraction: {
      level: 'warn'
    },
    substitution: {
      level: 'warn'
    },
    resolution: {
      level: 'warn'
    },
    validation: {
      level: 'warn'
    },
    format: {
      level: 'warn'
    },
    store: {
      level: 'warn'
    },
    template: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    cli: {
      level: 'error'
    }
  }
};
