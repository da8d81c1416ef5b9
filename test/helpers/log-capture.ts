import { Writable } from 'node:stream';
import winston from 'winston';
import { getLogger } from '../../src/utils';

const LEVEL_SEPARATOR = / - (DEBUG|INFO|WARN|ERROR) - /;

export interface LogCapture {
  lines: string[];
  messages(level: 'debug' | 'info' | 'warn' | 'error'): string[];
  flush(): Promise<void>;
  restore(): void;
}

/**
 * Route the logger's formatted output into memory while the other
 * transports stay quiet. Call restore() when done
 */
export const captureLogs = (): LogCapture => {
  const logger = getLogger();
  const lines: string[] = [];
  const transport = new winston.transports.Stream({
    stream: new Writable({
      write(chunk, _encoding, callback) {
        lines.push(String(chunk).trimEnd());
        callback();
      },
    }),
  });

  const wasSilent = logger.silent;
  const others = logger.transports.map((item) => ({ item, silent: item.silent }));
  others.forEach(({ item }) => {
    item.silent = true;
  });
  logger.silent = false;
  logger.add(transport);

  return {
    lines,
    messages: (level) => {
      const tag = ` - ${level.toUpperCase()} - `;
      return lines
        .filter((line) => line.match(LEVEL_SEPARATOR)?.[0] === tag)
        .map((line) => line.slice(line.indexOf(tag) + tag.length));
    },
    flush: () => new Promise((resolve) => setImmediate(resolve)),
    restore: () => {
      logger.remove(transport);
      others.forEach(({ item, silent }) => {
        item.silent = silent;
      });
      logger.silent = wasSilent;
    },
  };
};
