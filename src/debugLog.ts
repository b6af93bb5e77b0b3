import { appendFileSync } from 'fs';

let debugLogFilePath: string | null = null;

/**
 * Points debug logging at a file, or turns it off with `null`.
 */
export function configureDebugLog(filePath: string | null): void {
  debugLogFilePath = filePath;
}

export function formatDebugLine(
  scope: string,
  message: string,
  details?: Record<string, unknown>,
): string {
  const payload = details ? `${message} ${JSON.stringify(details)}` : message;
  return `[${scope}-debug] ${payload}`;
}

export function logDebug(scope: string, message: string, details?: Record<string, unknown>): void {
  if (!debugLogFilePath) return;
  const line = formatDebugLine(scope, message, details);

  try {
    appendFileSync(debugLogFilePath, `${new Date().toISOString()} ${line}\n`, 'utf8');
  } catch (error) {
    console.error('[debug-log-write-failed]', error);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
