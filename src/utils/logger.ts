/**
 * Logger utility using Pino
 */
import pino from 'pino';

const underTest = Boolean(process.env.VITEST) || process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || (underTest ? 'silent' : 'info');

let transport: pino.DestinationStream | undefined;
let transportError: unknown;
if (!underTest) {
  try {
    transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    });
  } catch (err) {
    // pino-pretty not available, use default
    transportError = err;
  }
}

const rootLogger = transport ? pino({ level }, transport) : pino({ level });
if (transportError) {
  rootLogger.debug({ err: transportError }, 'Pretty transport unavailable, logging JSON');
}

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
