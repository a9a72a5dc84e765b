import { debug } from 'debug'

/**
 * Leveled loggers on top of `debug`. Enable with `DEBUG=weak-publisher:*`.
 */
export const makeLog = (scope: string) => {
  const mkLog = debug('weak-publisher').extend(scope)
  return {
    debug: mkLog.extend('+'),
    info: mkLog.extend('++'),
    warn: mkLog.extend('+++'),
    error: mkLog.extend('++++'),
  }
}
