import pino from 'pino'

type LogLevel = 'info' | 'debug' | 'warn' | 'error'

/**
 * LoggerProvider wraps a pino instance shared by every package.
 * Without a destination, errors and fatals go to stderr and everything else
 * to stdout.
 * @description Call `init()` once at the top of an entry point. Until then,
 * messages are written through the console with a timestamp prefix.
 */
export class LoggerProvider {
  private pino: pino.Logger
  private hasBeenInitialized = false

  constructor(destination?: pino.DestinationStream) {
    this.pino = pino(
      {
        level: this.level,
      },
      destination ??
        pino.multistream(
          [
            { level: 'debug', stream: process.stdout },
            { level: 'error', stream: process.stderr },
          ],
          // each line goes to the highest matching stream only
          { dedupe: true },
        ),
    )
  }

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level() {
    return process.env['PINO_LEVEL'] || 'info'
  }

  init() {
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  info(message: string, ...args: unknown[]) {
    this.log('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this.log('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this.log('warn', message, args)
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    this.log('error', message, [error, ...args])
  }

  private log(level: LogLevel, message: string, args: unknown[]) {
    if (!this.hasBeenInitialized) {
      this.consoleLog(level, message, args)
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }

  private consoleLog(level: LogLevel, message: string, args: unknown[]) {
    const timestamp = new Date().toISOString()
    const line = `[${timestamp}] [${level.toUpperCase()}] ${message}`

    switch (level) {
      case 'error':
        console.error(line, ...args)
        break
      case 'warn':
        console.warn(line, ...args)
        break
      case 'debug':
        console.debug(line, ...args)
        break
      default:
        console.log(line, ...args)
    }
  }
}

export const logger = new LoggerProvider()
