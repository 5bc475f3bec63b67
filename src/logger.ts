/**
 * Sink for progress and diagnostics. `console` satisfies it.
 */
export type Logger = Pick<Console, "info" | "warn" | "error">
