function readDebugFlag(): boolean {
  const env = process.env
  return (
    env.NODE_ENV === 'development' ||
    env.DEBUG_LOGS === 'true' ||
    env.DEBUG === 'true'
  )
}

let debugEnabled = readDebugFlag()

export type ErrorReporter = (error: unknown, context?: Record<string, unknown>) => void

let errorReporter: ErrorReporter | null = null

export function setErrorReporter(reporter: ErrorReporter | null): void {
  errorReporter = reporter
}

// Drivers flip this at runtime (e.g. a debug key); null re-reads the environment
export function setDebugLogging(enabled: boolean | null): void {
  debugEnabled = enabled ?? readDebugFlag()
}

export function isDebugLogging(): boolean {
  return debugEnabled
}

export function debugLog(...args: unknown[]): void {
  if (debugEnabled) console.log(...args)
}

export function debugWarn(...args: unknown[]): void {
  if (debugEnabled) console.warn(...args)
}

export function logError(...args: unknown[]): void {
  console.error(...args)
  if (errorReporter) {
    // Avoid leaking arbitrary data by default; forward a best-effort summary.
    const error = args.find((a): a is Error => a instanceof Error)
      ?? new Error(typeof args[0] === 'string' ? args[0] : 'Unknown error')
    errorReporter(error, { args: args.map((a) => (typeof a === 'string' ? a : typeof a)) })
  }
}
