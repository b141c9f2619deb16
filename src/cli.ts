import { commands } from './commands';
import { IApp, ICommandContext, ILogger } from './types';
import { errorMessage } from './utils/errors';

export interface ICliOptions {
	logger: ILogger;
	createApp: () => Promise<IApp>;
	write: (text: string) => void;
}

/**
 * Dispatches one command line and resolves to the process exit code.
 * The pipeline is built lazily and closed before returning.
 */
export const run = async (argv: string[], options: ICliOptions): Promise<number> => {
	const [name = 'help', ...args] = argv;
	const command = commands.get(name);
	if (!command) {
		options.logger.error(`[CLI] Unknown command '${name}'. Run 'qa-forge help' for a list of commands.`);
		return 2;
	}

	const opened: { app: Promise<IApp> | null } = { app: null };
	const context: ICommandContext = {
		logger: options.logger,
		commands,
		getApp: () => {
			if (!opened.app) {
				opened.app = options.createApp();
			}
			return opened.app;
		},
	};

	let exitCode = 0;
	try {
		options.write(await command.execute(context, args));
	} catch (error) {
		options.logger.error(`[CLI] ${name} failed: ${errorMessage(error)}`);
		exitCode = 1;
	}

	if (opened.app) {
		try {
			await (await opened.app).close();
		} catch (error) {
			options.logger.debug(`[CLI] Shutdown skipped: ${errorMessage(error)}`);
		}
	}
	return exitCode;
};
