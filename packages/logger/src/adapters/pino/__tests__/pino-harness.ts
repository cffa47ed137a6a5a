import { Writable } from "node:stream"
import type { LogEntry, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { type LogLevelName, logLevelNames } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

function levelName(level: unknown): LogLevelName {
  return logLevelNames[Number(level) / 10 - 1] ?? "info"
}

export const pinoHarness: LoggerHarness = {
  name: "PinoLogger",
  create: (level) => {
    const entries: LogEntry[] = []

    const destination = new Writable({
      write(chunk, _encoding, cb) {
        const { level: raw, msg, time: _time, pid: _pid, hostname: _host, ...fields } = JSON.parse(
          chunk.toString(),
        )

        entries.push({ level: levelName(raw), message: String(msg), fields })
        cb()
      },
    })

    return { logger: new PinoLogger({ destination }, { level, prettify: false }), entries }
  },
}
