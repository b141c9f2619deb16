import path from 'path';
import fs from 'fs/promises';

import { ICommand } from '../types';

/**
 * Expands directory arguments into the files beneath them, in name order.
 * Hidden entries inside directories are skipped; explicit file arguments are kept as given.
 */
export const expandPaths = async (inputs: string[]): Promise<string[]> => {
	const files: string[] = [];

	const walk = async (directory: string): Promise<void> => {
		const entries = await fs.readdir(directory, { withFileTypes: true });
		entries.sort((a, b) => a.name.localeCompare(b.name));
		for (const entry of entries) {
			if (entry.name.startsWith('.')) continue;
			const entryPath = path.join(directory, entry.name);
			if (entry.isDirectory()) {
				await walk(entryPath);
			} else if (entry.isFile()) {
				files.push(entryPath);
			}
		}
	};

	for (const input of inputs) {
		const stats = await fs.stat(input);
		if (stats.isDirectory()) {
			await walk(input);
		} else {
			files.push(input);
		}
	}
	return files;
};

const command: ICommand = {
	name: 'ingest',
	description: 'Chunks, embeds and stores documents in the knowledge base',
	usage: 'ingest <file|directory> [...more]',
	execute: async (context, args) => {
		if (args.length === 0) {
			throw new Error(`Usage: qa-forge ${command.usage}`);
		}

		const files = await expandPaths(args);
		if (files.length === 0) {
			return 'No files found to ingest.';
		}

		const app = await context.getApp();
		const chunks = await app.ingestor.ingestFiles(files);
		return `Ingested ${chunks} chunk(s) from ${files.length} file(s) into '${app.index.collectionName}'.`;
	},
};

export default command;
