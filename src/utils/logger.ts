import pino, { type LoggerOptions } from 'pino';

/** Unknown levels fall back to info; config validation reports them once the run starts. */
export function resolveLogLevel(raw: string | undefined): string {
  if (raw === 'silent') return raw;
  if (raw !== undefined && Object.hasOwn(pino.levels.values, raw)) return raw;
  return 'info';
}

const level = resolveLogLevel(process.env.LOG_LEVEL);

// stdout is reserved for the merged output path, so every log line goes to stderr.
const options: LoggerOptions = { level, base: { app: 'pmex-borrowers' } };

export const logger =
  process.stderr.isTTY && level !== 'silent'
    ? pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, destination: 2 },
        },
      })
    : pino(options, pino.destination(2));
