import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';

const LogRecordSchema = z
  .object({
    level: z.number(),
    msg: z.string(),
  })
  .passthrough();

export type LogRecord = z.infer<typeof LogRecordSchema>;

/**
 * Logger writing parsed records into an array, for asserting on log output.
 * For use in unit tests only.
 */
export function createCapturingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string): void {
        records.push(LogRecordSchema.parse(JSON.parse(line)));
      },
    },
  );
  return { logger, records };
}

export function jsonResponse(body: unknown, status = 200, statusText = ''): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}
