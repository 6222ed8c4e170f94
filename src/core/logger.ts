import pino from 'pino'
import type { LogLevel } from './config.js'

export type Logger = pino.Logger

/** JSON logs go to stderr so command output on stdout stays parseable. */
export function createLogger(level: LogLevel = 'info'): Logger {
	return pino(
		{
			level,
			base: { app: 'swing-market-data' },
			redact: {
				paths: ['apiKey', 'apikey', 'token', 'params.apikey', 'params.token', 'url'],
				censor: '[redacted]',
			},
			serializers: {
				err: pino.stdSerializers.err,
				error: pino.stdSerializers.err,
			},
		},
		pino.destination(2),
	)
}

export const silentLogger: Logger = pino({ level: 'silent' })
