import fs from 'fs';
import path from 'path';
import chalk from 'chalk';

import { ILogger, ILoggerOptions } from '../types';

type LogMessage = string | Error;

/**
 * Logger class for logging messages to console and, optionally, to file.
 * Supports different log levels: success, log, error, warn, info, debug.
 * File logs are stored in a structured directory based on date.
 */
class Logger implements ILogger {
	private readonly logFilePath: string | null;
	private readonly isDebugEnabled: boolean;
	private readonly isSilent: boolean;

	constructor(options: ILoggerOptions = {}) {
		this.isDebugEnabled = options.debug ?? false;
		this.isSilent = options.silent ?? false;
		this.logFilePath = options.logDir ? this.generateLogFilePath(path.resolve(options.logDir)) : null;
		if (this.isDebugEnabled) {
			this.info('Debug mode is enabled');
		}
	}

	private getCurrentTimestamp(): string {
		const date: Date = new Date();
		return `[${date.toISOString()}]`;
	}

	private formatMessage(message: LogMessage): string {
		if (message instanceof Error) {
			return `${message.message}\nStack trace:\n${message.stack}`;
		}
		return message;
	}

	private writeToLogFile(logMessage: string): void {
		if (!this.logFilePath) return;
		const logWithoutColor: string = logMessage.replace(/\u001b\[\d+m/g, '');
		fs.appendFileSync(this.logFilePath, logWithoutColor + '\n', 'utf8');
	}

	private generateLogFilePath(logsBasePath: string): string {
		const now: Date = new Date();
		const year: number = now.getFullYear();
		const month: string = now.toLocaleDateString('en-US', {
			month: 'long',
		});
		const formattedDate: string = `${year}-${(now.getMonth() + 1).toString().padStart(2, '0')}-${now.getDate().toString().padStart(2, '0')}`;

		const monthFolderPath: string = path.join(logsBasePath, year.toString(), month);
		fs.mkdirSync(monthFolderPath, { recursive: true });

		return path.join(monthFolderPath, `qa-forge-${formattedDate}.log`);
	}

	private logWithLevel(level: string, color: (text: string) => string, message: LogMessage, forceLog: boolean = true): void {
		if (!forceLog && !this.isDebugEnabled) {
			return;
		}

		const timestamp = this.getCurrentTimestamp();
		const formattedMessage = this.formatMessage(message);

		if (!this.isSilent) {
			// stdout is reserved for command output
			console.error(color(`[${level}]`), formattedMessage);
		}
		this.writeToLogFile(`${timestamp} ${color(level)} ${formattedMessage}`);
	}

	public success(message: LogMessage): void {
		this.logWithLevel('SUCCESS', chalk.green, message);
	}

	public log(message: LogMessage): void {
		this.logWithLevel('LOG', chalk.blue, message);
	}

	public error(message: LogMessage): void {
		this.logWithLevel('ERROR', chalk.red, message);
	}

	public warn(message: LogMessage): void {
		this.logWithLevel('WARN', chalk.yellow, message);
	}

	public info(message: LogMessage): void {
		this.logWithLevel('INFO', chalk.cyan, message);
	}

	public debug(message: LogMessage): void {
		this.logWithLevel('DEBUG', chalk.magenta, message, false);
	}
}

export default Logger;
