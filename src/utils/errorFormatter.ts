let showStackTraces = false;

/**
 * Switched on by `--debug`.
 */
export function setDebugLogging(enabled: boolean): void {
  showStackTraces = enabled;
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Renders anything a command threw for a `Command failed: ...` line. Errors print their message,
 * or their stack under `--debug`; other values are shown as JSON.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return showStackTraces && error.stack ? error.stack : error.message;
  }
  return typeof error === 'string' ? error : describeValue(error);
}
