import { ICommand } from '../types';

const command: ICommand = {
	name: 'help',
	description: 'Lists all available commands, or details for one',
	usage: 'help [command]',
	execute: async (context, args) => {
		const requested = args[0];
		if (requested) {
			const found = context.commands.get(requested);
			if (!found) {
				throw new Error(`Unknown command '${requested}'`);
			}
			return `qa-forge ${found.usage}\n\n${found.description}`;
		}

		const commands = [...context.commands.values()].sort((a, b) => a.name.localeCompare(b.name));
		const width = Math.max(...commands.map((cmd) => cmd.usage.length));
		const lines = commands.map((cmd) => `  ${cmd.usage.padEnd(width)}  ${cmd.description}`);
		return ['Usage: qa-forge <command> [args]', '', 'Commands:', ...lines].join('\n');
	},
};

export default command;
