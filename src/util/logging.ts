import pino from 'pino';

/**
 * Creates a pino logger writing to stderr, so stdout only carries the guide.
 * At debug level messages get a marker prefix to stand out in a busy terminal.
 */
export function createLogger(destination: pino.DestinationStream = pino.destination(2)) {
  const level = process.env.LOG_LEVEL ?? 'info';
  const highlightMsg = level === 'debug';

  return pino(
    {
      level,
      ...(highlightMsg ? { msgPrefix: '✦ ' } : {}),
    },
    destination,
  );
}
