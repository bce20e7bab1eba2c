import { Writable } from "node:stream"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { isLogLevelName, type LogLevelName, LogLevels } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName: Record<number, LogLevelName> = {
  [LogLevels.Trace]: "trace",
  [LogLevels.Debug]: "debug",
  [LogLevels.Info]: "info",
  [LogLevels.Warn]: "warn",
  [LogLevels.Error]: "error",
  [LogLevels.Fatal]: "fatal",
}

export function captureLines() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, destination }
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (opts) => {
      const { lines, destination } = captureLines()

      const read = (): CapturedLog[] =>
        lines.map((payload) => {
          const name = pinoLevelToName[Number(payload.level)]
          return { level: isLogLevelName(name) ? name : "info", payload }
        })

      return {
        logger: new PinoLogger({ destination }, { level: opts?.level ?? "trace" }),
        read,
        clear: () => {
          lines.length = 0
        },
      }
    },
  }
}
