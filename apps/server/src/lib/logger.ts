/**
 * JSON-line logging: one object per line, events to stdout and errors to
 * stderr, each stamped with an ISO timestamp.
 */

export type LogFields = Record<string, unknown>

export interface Logger {
  info(fields: LogFields): void
  error(op: string, err: unknown, fields?: LogFields): void
}

function line(fields: LogFields): string {
  return JSON.stringify({ ts: new Date().toISOString(), ...fields }) + '\n'
}

export const jsonLogger: Logger = {
  info(fields) {
    process.stdout.write(line(fields))
  },
  error(op, err, fields = {}) {
    const error = err instanceof Error ? err.message : String(err)
    process.stderr.write(line({ level: 'error', op, error, ...fields }))
  },
}
