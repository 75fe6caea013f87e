import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Optional file output, enabled by TEMPLATE_TOOLS_LOG_FILE
  files: {
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    loop: {
      level: 'error'
    },
    data: {
      level: 'error'
    },
    toolbox: {
      level: 'error'
    },
    config: {
      level: 'warn'
    }
  }
} as const;

export type LoggingService = keyof typeof loggingConfig.services;
