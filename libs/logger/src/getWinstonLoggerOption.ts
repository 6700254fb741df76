import { format, LoggerOptions, transports } from 'winston';

// stdout belongs to the assistant's replies
const STDERR_LEVELS = ['error', 'warn', 'info', 'debug'];

export function getWinstonLoggerOption(
  nodeEnv = process.env.NODE_ENV,
): LoggerOptions {
  const isLocalEnv = nodeEnv === 'local';
  const level = isLocalEnv ? 'debug' : 'info';

  return {
    level,
    silent: nodeEnv === 'test',
    transports: [
      new transports.Console({
        level,
        stderrLevels: STDERR_LEVELS,
        format: isLocalEnv ? getLocalFormat() : getProductionFormat(),
      }),
    ],
  };
}

function getLocalFormat() {
  return format.combine(
    format.printf(({ message, stack }) =>
      [message, stack].filter(Boolean).join('\n'),
    ),
  );
}

function getProductionFormat() {
  return format.combine(
    format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    format.ms(),
    format.json(),
  );
}
