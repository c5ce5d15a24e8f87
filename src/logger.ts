import winston from 'winston';

const serializeError = (error: unknown) => {
  if (!(error instanceof Error)) {
    return error;
  }
  const serialized: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack
  };
  Object.entries(error).forEach(([key, value]) => {
    serialized[key] = value;
  });
  return serialized;
};

const normalizeErrorsFormat = winston.format((info) => {
  Object.entries(info).forEach(([key, value]) => {
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  });
  return info;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    normalizeErrorsFormat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'poker-combat-engine' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const details = meta && Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${message}${details}`;
        })
      )
    })
  ]
});

export default logger;
