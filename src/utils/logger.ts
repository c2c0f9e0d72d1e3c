import winston from 'winston';

// Lambda ships stdout to CloudWatch as-is, so keep JSON lines there
const isLambda = Boolean(process.env.AWS_LAMBDA_FUNCTION_NAME);
const plainConsole = isLambda || process.env.NODE_ENV === 'production';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'model-deployment' },
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === 'test',
      format: plainConsole
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
    })
  ],
});

if (process.env.LOG_FILE) {
  logger.add(new winston.transports.File({
    filename: process.env.LOG_FILE
  }));
}

export default logger;
