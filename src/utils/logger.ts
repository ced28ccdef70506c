/**
 * Logger Configuration
 * Winston-based logging for the provisioner CLI
 */

import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'pretty'; // 'json' or 'pretty'

// Keep the console readable for the person running the tool
const prettyFormat = winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
  const prefix = typeof component === 'string' ? `[${component}] ` : '';
  let msg = `${timestamp} ${level}: ${prefix}${message}`;

  const { service: _service, stack, ...rest } = metadata;
  if (Object.keys(rest).length > 0) {
    msg += ` ${JSON.stringify(rest)}`;
  }
  if (typeof stack === 'string' && logLevel === 'debug') {
    msg += `\n${stack}`;
  }

  return msg;
});

const logger = winston.createLogger({
  level: logLevel,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.errors({ stack: true })
  ),
  defaultMeta: { service: 'iot2050-config' },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      format: winston.format.combine(
        winston.format.colorize(),
        logFormat === 'json' ? winston.format.json() : prettyFormat
      ),
    }),
  ],
});

// Optional file output
if (process.env.LOG_FILE) {
  logger.add(new winston.transports.File({
    filename: process.env.LOG_FILE,
    format: winston.format.json(),
    maxsize: 10485760, // 10MB
    maxFiles: 5,
  }));
}

export default logger;
export { logger };
