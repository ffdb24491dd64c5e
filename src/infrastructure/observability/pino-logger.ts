import { pino } from 'pino'
import { Logger, LoggerContext } from '../../application/ports/logger.js'

export interface PinoLoggerOptions {
  name: string
  level: pino.LevelWithSilent
  prettyLogs: boolean
}

export class PinoLogger implements Logger {
  constructor(private readonly pinoInstance: pino.Logger) {}

  static fromOptions(options: PinoLoggerOptions): PinoLogger {
    return new PinoLogger(pino({
      name: options.name,
      level: options.level,
      transport: options.prettyLogs ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      } : undefined
    }))
  }

  info(message: string, obj?: object): void {
    this.write('info', message, obj)
  }

  error(message: string, obj?: object): void {
    this.write('error', message, obj)
  }

  warn(message: string, obj?: object): void {
    this.write('warn', message, obj)
  }

  debug(message: string, obj?: object): void {
    this.write('debug', message, obj)
  }

  child(context: LoggerContext): Logger {
    return new PinoLogger(this.pinoInstance.child(context))
  }

  private write(level: 'info' | 'error' | 'warn' | 'debug', message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance[level](obj, message)
    } else {
      this.pinoInstance[level](message)
    }
  }
}
