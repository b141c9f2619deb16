import { ICommand } from '../types';

const command: ICommand = {
	name: 'testcases',
	description: 'Generates grounded test cases for a feature request',
	usage: 'testcases <request...>',
	execute: async (context, args) => {
		const request = args.join(' ').trim();
		if (!request) {
			throw new Error(`Usage: qa-forge ${command.usage}`);
		}

		const app = await context.getApp();
		const result = await app.agent.generateTestCases(request);
		return JSON.stringify(result, null, 2);
	},
};

export default command;
