/**
 * Logger
 *
 * The library writes diagnostics through this narrow slice of the console
 * API so callers can redirect or silence them.
 */

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export const consoleLogger: Logger = console

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
}
