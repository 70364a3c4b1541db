import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

interface EnvConfig {
  // Server
  port: number;
  nodeEnv: string;

  // File Upload
  upload: {
    directory: string;
    maxFileSizeMB: number;
  };

  // Reports
  reports: {
    directory: string;
  };

  // Validation
  validation: {
    minValueThreshold: number;
    maxValueThreshold: number;
  };

  // Compliance documentation
  compliance: {
    regulationYear: number;
  };

  // Logging
  logging: {
    level: string;
    file: string;
  };
}

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  const parsed = value ? parseFloat(value) : NaN;
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

export const config: EnvConfig = {
  port: getEnvNumber('PORT', 3000),
  nodeEnv: getEnvVar('NODE_ENV', 'development'),

  upload: {
    directory: getEnvVar('UPLOAD_DIR', 'uploads/temp'),
    maxFileSizeMB: getEnvNumber('MAX_FILE_SIZE_MB', 50),
  },

  reports: {
    directory: getEnvVar('REPORT_DIR', 'reports'),
  },

  validation: {
    minValueThreshold: getEnvFloat('VALIDATION_MIN_VALUE', 0),
    maxValueThreshold: getEnvFloat('VALIDATION_MAX_VALUE', 1e9),
  },

  compliance: {
    regulationYear: getEnvNumber('REGULATION_YEAR', new Date().getFullYear()),
  },

  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: getEnvVar('LOG_FILE', 'logs/app.log'),
  },
};

export const isDevelopment = config.nodeEnv === 'development';
export const isTest = config.nodeEnv === 'test';
