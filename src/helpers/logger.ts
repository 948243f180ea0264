import winston from 'winston';

const isDevelopment = process.env.NODE_ENV === 'development';
const isJson = process.env.LOG_FORMAT === 'json';

const renderMeta = (meta: Record<string, unknown>): string =>
	Object.keys(meta).length > 0 ? '\n' + JSON.stringify(meta, null, 2) : '';

const humanFormat = isDevelopment
	? winston.format.combine(
			winston.format.colorize(),
			winston.format.timestamp({ format: 'HH:mm:ss' }),
			winston.format.printf(
				({ timestamp, level, message, ...meta }) =>
					`[${timestamp}] ${level}: ${message}${renderMeta(meta)}`
			)
		)
	: winston.format.printf(
			({ level, message, ...meta }) =>
				`${level}: ${message}${renderMeta(meta)}`
		);

/**
 * Application logger using Winston
 */
export const logger = winston.createLogger({
	level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
	silent: !process.env.LOGGER && process.env.NODE_ENV === 'test',
	format: isJson
		? winston.format.combine(
				winston.format.timestamp(),
				winston.format.errors({ stack: true }),
				winston.format.json()
			)
		: humanFormat,
	transports: [new winston.transports.Console()],
	exitOnError: false
});

export default logger;
