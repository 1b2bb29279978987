import pino from 'pino'
import { isDevelopment } from '@shared/utils/environment'
import { LOG_LEVEL } from '@config/constants'

// Create logger with appropriate configuration
const isDevMode = isDevelopment()

const pinoLogger = pino({
  level: LOG_LEVEL ?? (isDevMode ? 'debug' : 'info'),
  transport: isDevMode
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname'
        }
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label }
    }
  },
  base: {
    pid: process.pid,
    app: 'ip-protocol-registry'
  }
})

// Supports both: logger.info(msg, obj) and logger.info(obj, msg)
function createLogMethod(level: 'info' | 'warn' | 'error' | 'debug') {
  return (msgOrObj: string | object, objOrMsg?: object | string | unknown) => {
    if (typeof msgOrObj === 'string') {
      if (objOrMsg !== undefined) {
        if (typeof objOrMsg === 'object' && objOrMsg !== null) {
          pinoLogger[level](objOrMsg, msgOrObj)
        } else {
          pinoLogger[level]({ data: objOrMsg }, msgOrObj)
        }
      } else {
        pinoLogger[level](msgOrObj)
      }
    } else {
      if (objOrMsg && typeof objOrMsg === 'string') {
        pinoLogger[level](msgOrObj, objOrMsg)
      } else {
        pinoLogger[level](msgOrObj)
      }
    }
  }
}

export const logger = {
  info: createLogMethod('info'),
  warn: createLogMethod('warn'),
  error: createLogMethod('error'),
  debug: createLogMethod('debug'),
  // Expose the underlying pino instance for advanced usage
  child: pinoLogger.child.bind(pinoLogger)
}

export type Logger = typeof logger
