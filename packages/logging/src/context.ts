import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const boundedIdentifier = z.string().min(1).max(128);

export const LogContextSchema = z
  .object({
    correlation_id: boundedIdentifier.optional(),
    request_id: boundedIdentifier.optional(),
    subject: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const requestScope = new AsyncLocalStorage<LogContext>();

/** Every event logged while `operation` runs, including after awaits, carries `context`. */
export const runWithLogContext = <T>(context: LogContext, operation: () => T): T =>
  requestScope.run(LogContextSchema.parse(context), operation);

export const getLogContext = (): LogContext | undefined => requestScope.getStore();

/**
 * Adds fields that become known part way through a request, such as the authenticated subject.
 * Returns undefined, and changes nothing, outside a request scope.
 */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const context = requestScope.getStore();
  if (context) {
    Object.assign(context, LogContextSchema.partial().parse(fields));
  }

  return context;
};
