import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Where JSON lines are written. Defaults to stdout.
   *
   * @remarks
   * When set, `prettify` is ignored: pretty output runs in a transport worker
   * that owns its own destination.
   */
  destination?: DestinationStream

  /** Reuse an existing pino instance instead of creating one. */
  base?: PinoLoggerBase
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
    deps: PinoLoggerDeps = {},
  ) {
    this.logger = deps.base
      ? deps.base.child(bindings)
      : this.createBase(deps.destination).child(bindings)
  }

  private createBase(destination?: DestinationStream): PinoLoggerBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify &&
        !destination && {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss.l",
              ignore: "hostname",
            },
          },
        }),
    }

    return destination ? pino(pinoOpts, destination) : pino(pinoOpts)
  }

  trace(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.trace(this.toPinoMeta(meta), message)
  }

  debug(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.debug(this.toPinoMeta(meta), message)
  }

  info(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.info(this.toPinoMeta(meta), message)
  }

  warn(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.warn(this.toPinoMeta(meta), message)
  }

  error(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.error(this.toPinoMeta(meta), message)
  }

  fatal(message: string, meta: LogMeta<TContext> = {}): void {
    this.logger.fatal(this.toPinoMeta(meta), message)
  }

  private toPinoMeta(meta: LogMeta<TContext>) {
    return meta as unknown as Parameters<PinoLoggerBase["info"]>[0]
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(this.opts, context, { base: this.logger })
  }
}

export function createPinoLogger(
  opts: Partial<LoggerOptions> = {},
  bindings: LogContextPatch = {},
): Logger {
  return new PinoLogger(opts, bindings)
}
