#!/usr/bin/env node
import { createApp, createLogger } from './app';
import { run } from './cli';
import { ConfigManager } from './utils/config';
import { errorMessage } from './utils/errors';
import Logger from './utils/logger';

const main = async (): Promise<number> => {
	let config: ConfigManager;
	try {
		config = ConfigManager.getInstance();
	} catch (error) {
		new Logger().error(`[INDEX] ${errorMessage(error)}`);
		return 2;
	}

	const logger = createLogger(config);
	return run(process.argv.slice(2), {
		logger,
		createApp: () => createApp(config, { logger }),
		write: (text) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
	});
};

main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((error: unknown) => {
		console.error(error);
		process.exitCode = 1;
	});
