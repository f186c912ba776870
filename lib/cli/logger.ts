export interface Logger {
  log: typeof console.log
  info: typeof console.info
  warn: typeof console.warn
  error: typeof console.error
}

const logger: Logger = {
  log: console.log,
  info: console.info,
  warn: console.warn,
  error: console.error,
}

export function getLogger(): Logger {
  return logger
}
