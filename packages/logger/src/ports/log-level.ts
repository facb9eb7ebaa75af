/**
 * Level names in increasing severity. Values match pino's level labels.
 */
export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]
