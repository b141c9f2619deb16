import fs from 'fs/promises';

import { ICommand } from '../types';
import { isMapping } from '../core/rag/normalize';

/**
 * Reads a test case from a JSON file holding either one object or an array whose first element is used
 */
export const readTestCase = async (filePath: string): Promise<Record<string, unknown>> => {
	const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
	const candidate: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
	if (!isMapping(candidate)) {
		throw new Error(`${filePath} does not contain a test case object`);
	}
	return candidate;
};

const command: ICommand = {
	name: 'script',
	description: 'Generates a Selenium script for a test case against a page',
	usage: 'script <testcase.json> <page.html>',
	execute: async (context, args) => {
		const [testCasePath, htmlPath] = args;
		if (!testCasePath || !htmlPath) {
			throw new Error(`Usage: qa-forge ${command.usage}`);
		}

		const testCase = await readTestCase(testCasePath);
		const html = await fs.readFile(htmlPath, 'utf8');

		const app = await context.getApp();
		return app.agent.generateSeleniumScript(testCase, html);
	},
};

export default command;
