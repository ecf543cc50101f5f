export interface StructuredTelemetryEntry {
  readonly event: string;
  readonly timestamp: number;
  readonly payload: Record<string, unknown>;
}

function isProduction(): boolean {
  return typeof process !== 'undefined' && process.env.NODE_ENV === 'production';
}

export function emitStructuredTelemetry(
  event: string,
  payload: Record<string, unknown>
): StructuredTelemetryEntry {
  const entry: StructuredTelemetryEntry = {
    event,
    timestamp: Date.now(),
    payload: { ...payload }
  };
  if (isProduction()) {
    console.info(event, entry);
  } else {
    console.debug(`[telemetry] ${event}`, entry);
  }
  return entry;
}

/** Storage problems never stop a match; they are logged and handed back to the caller. */
export function reportPersistenceFailure(context: string, error: unknown): void {
  console.warn(`Progress persistence failed during ${context}`, error);
}
