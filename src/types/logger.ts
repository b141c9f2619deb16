export interface ILogger {
	success(message: string | Error): void;
	log(message: string | Error): void;
	error(message: string | Error): void;
	warn(message: string | Error): void;
	info(message: string | Error): void;
	debug(message: string | Error): void;
}

export interface ILoggerOptions {
	debug?: boolean;
	logDir?: string | null;
	silent?: boolean;
}
