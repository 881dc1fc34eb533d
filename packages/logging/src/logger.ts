import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;
type EventLevel = Exclude<LogLevel, 'silent'>;

const SEVERITY = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
} as const satisfies Record<LogLevel, number>;

const boundedIdentifier = z.string().min(1).max(128);

export const LogEventInputSchema = z
  .object({
    level: LogLevelSchema.exclude(['silent']),
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: boundedIdentifier.optional(),
    request_id: boundedIdentifier.optional(),
    subject: z.string().min(1).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

/** One serialized log line. */
export type LogEvent = {
  ts: string;
  level: EventLevel;
  service: string;
  env: string;
  event: string;
  component: string;
  correlation_id: string;
  request_id: string;
  message?: string;
  subject?: string;
  reason_code?: string;
  duration_ms?: number;
  status_code?: number;
  route?: string;
  method?: string;
  metadata: Record<string, unknown>;
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod = (input: Omit<LogEventInput, 'level'>) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: LevelMethod;
  info: LevelMethod;
  warn: LevelMethod;
  error: LevelMethod;
  fatal: LevelMethod;
  isLevelEnabled: (level: EventLevel) => boolean;
};

const UNSET_IDENTIFIER = 'n/a';

const toEvent = ({
  input,
  context,
  ts,
  service,
  env,
  metadata
}: {
  input: LogEventInput;
  context: LogContext | undefined;
  ts: string;
  service: string;
  env: string;
  metadata: Record<string, unknown>;
}): LogEvent => {
  const subject = input.subject ?? context?.subject;
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;

  const event: LogEvent = {
    ts,
    level: input.level,
    service,
    env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? UNSET_IDENTIFIER,
    request_id: input.request_id ?? context?.request_id ?? UNSET_IDENTIFIER,
    metadata
  };

  if (input.message) {
    event.message = input.message;
  }
  if (subject) {
    event.subject = subject;
  }
  if (input.reason_code) {
    event.reason_code = input.reason_code;
  }
  if (input.duration_ms !== undefined) {
    event.duration_ms = input.duration_ms;
  }
  if (input.status_code !== undefined) {
    event.status_code = input.status_code;
  }
  if (route) {
    event.route = route;
  }
  if (method) {
    event.method = method;
  }

  return event;
};

const toMetadataRecord = (value: unknown): Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) ? {...value} : {};

/**
 * JSON-lines logger. Debug through warn go to stdout, error and fatal to stderr. Request-scoped
 * fields are read from the active log context; fields passed explicitly win. A log call never
 * throws, whatever the input or the writer does.
 */
export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const threshold = SEVERITY[LogLevelSchema.parse(options.level)];
  const writer = options.writer ?? {stdout: process.stdout, stderr: process.stderr};
  const now = options.now ?? (() => new Date());
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const isLevelEnabled = (level: EventLevel) => SEVERITY[level] >= threshold;

  const log = (rawInput: LogEventInput) => {
    if (!isLevelEnabled(rawInput.level)) {
      return;
    }

    try {
      const input = LogEventInputSchema.parse(rawInput);
      const event = toEvent({
        input,
        context: getLogContext(),
        ts: now().toISOString(),
        service,
        env,
        metadata: toMetadataRecord(sanitizeForLog({value: input.metadata ?? {}, extraSensitiveKeys}))
      });
      const stream = SEVERITY[input.level] >= SEVERITY.error ? writer.stderr : writer.stdout;
      stream.write(`${JSON.stringify(event)}\n`);
    } catch {
      // A failed log write is dropped.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'}),
    isLevelEnabled
  };
};

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined,
  isLevelEnabled: () => false
});
