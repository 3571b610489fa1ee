import pino from 'pino';
import { config } from './config';

// pino uses JSON.stringify internally; a BigInt anywhere in an error record
// makes it drop the whole merging object and only print the message.
(BigInt.prototype as unknown as Record<string, unknown>).toJSON = function (this: bigint) {
  return this.toString();
};

const transport = config.isDev
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        singleLine: false,
      },
    })
  : undefined;

const logger = pino(
  {
    level: config.logLevel,
  },
  transport
);

export default logger;
