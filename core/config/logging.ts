import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // Optional JSON log file, enabled by MDTASK_LOG_FILE
  files: {
    maxSize: 5242880, // 5MB
    maxFiles: 3,
    tailable: true
  },

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    parser: {
      level: 'error'
    },
    resolver: {
      level: 'error'
    },
    executor: {
      level: 'error'
    },
    config: {
      level: 'error'
    },
    locator: {
      level: 'error'
    },
    cli: {
      level: 'error'
    }
  }
} as const;

export type ServiceName = keyof typeof loggingConfig.services;
