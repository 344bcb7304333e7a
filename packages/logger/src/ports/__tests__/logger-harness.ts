import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

/** One emitted entry; `fields` holds everything except level and message */
export type CapturedLog = Readonly<{
  level: LogLevelName
  msg: string
  fields: Record<string, unknown>
}>

export type CapturingLogger = {
  logger: Logger
  /** Entries emitted since creation or the last `clear()` */
  read: () => CapturedLog[]
  clear: () => void
}

export type LoggerHarness = {
  name: string
  make: (level: LogLevelName) => CapturingLogger
}
