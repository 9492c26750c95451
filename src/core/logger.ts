export type LogStatus = 'START' | 'SUCCESS' | 'DEGRADED' | 'REJECTED' | 'ERROR' | `CALL_${string}`;

/**
 * Write one structured line: `[time] [SCOPE] [operation] [status] Nms details`.
 */
export function logEvent(
  scope: string,
  operation: string,
  status: LogStatus,
  durationMs: number,
  details = ''
): void {
  const line = `[${new Date().toISOString()}] [${scope}] [${operation}] [${status}] ${durationMs}ms ${details}`.trimEnd();
  if (status === 'ERROR') {
    console.error(line);
  } else if (status === 'DEGRADED' || status === 'REJECTED') {
    console.warn(line);
  } else {
    console.log(line);
  }
}
