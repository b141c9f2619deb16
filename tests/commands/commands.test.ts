import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { run } from '../../src/cli';
import { expandPaths } from '../../src/commands/ingest';
import { readTestCase } from '../../src/commands/script';
import { IApp, ILogger } from '../../src/types';
import { createTestApp } from '../helpers/app';
import { FakeGenerator, createLogger } from '../helpers/fakes';

interface IHarness {
	logger: ILogger;
	output: string[];
	createApp: Mock<() => Promise<IApp>>;
}

const harness = (app: Promise<IApp> | null = null): IHarness => ({
	logger: createLogger(),
	output: [],
	createApp: vi.fn<() => Promise<IApp>>(() => app ?? createTestApp()),
});

const runWith = (h: IHarness, argv: string[]): Promise<number> => run(argv, { logger: h.logger, createApp: h.createApp, write: (text) => h.output.push(text) });

describe('cli', () => {
	let directory: string;

	beforeEach(async () => {
		directory = await fs.mkdtemp(path.join(os.tmpdir(), 'qa-forge-cli-'));
	});

	afterEach(async () => {
		await fs.rm(directory, { recursive: true, force: true });
	});

	it('prints help without building the pipeline', async () => {
		const h = harness();

		expect(await runWith(h, [])).toBe(0);

		const lines = h.output[0].split('\n');
		expect(lines.slice(0, 3)).toEqual(['Usage: qa-forge <command> [args]', '', 'Commands:']);
		expect(lines.slice(3).map((line) => line.trim().split(' ')[0])).toEqual(['help', 'ingest', 'script', 'testcases']);
		expect(h.createApp).not.toHaveBeenCalled();
	});

	it('describes a single command', async () => {
		const h = harness();

		expect(await runWith(h, ['help', 'ingest'])).toBe(0);
		expect(h.output).toEqual(['qa-forge ingest <file|directory> [...more]\n\nChunks, embeds and stores documents in the knowledge base']);
	});

	it('rejects unknown commands', async () => {
		const h = harness();

		expect(await runWith(h, ['deploy'])).toBe(2);
		expect(h.logger.error).toHaveBeenCalledWith("[CLI] Unknown command 'deploy'. Run 'qa-forge help' for a list of commands.");
	});

	it('fails with usage when ingest has no paths', async () => {
		const h = harness();

		expect(await runWith(h, ['ingest'])).toBe(1);
		expect(h.logger.error).toHaveBeenCalledWith('[CLI] ingest failed: Usage: qa-forge ingest <file|directory> [...more]');
		expect(h.createApp).not.toHaveBeenCalled();
	});

	it('ingests a directory and then answers the discount-code request', async () => {
		await fs.writeFile(path.join(directory, 'product_specs.md'), 'SAVE15 gives 15% off the cart.');
		await fs.writeFile(path.join(directory, 'checkout.html'), '<p>Discount code</p><button>Apply</button>');
		const app = createTestApp();

		const ingest = harness(app);
		expect(await runWith(ingest, ['ingest', directory])).toBe(0);
		expect(ingest.output).toEqual(["Ingested 2 chunk(s) from 2 file(s) into 'qa_agent'."]);

		const generate = harness(app);
		expect(await runWith(generate, ['testcases', 'Test', 'SAVE15'])).toBe(0);
		const result: unknown = JSON.parse(generate.output[0]);
		expect(result).toMatchObject({ testcases: [{ Test_ID: 'TC-001', Grounded_In: ['product_specs.md', 'checkout.html'] }, {}, {}, {}] });
	});

	it('refuses to ingest a directory holding two files with the same name', async () => {
		await fs.mkdir(path.join(directory, 'a'));
		await fs.mkdir(path.join(directory, 'b'));
		await fs.writeFile(path.join(directory, 'a', 'notes.md'), 'Discount codes apply at checkout.');
		await fs.writeFile(path.join(directory, 'b', 'notes.md'), 'SAVE15 gives 15% off the cart.');
		const app = createTestApp();
		const h = harness(app);

		expect(await runWith(h, ['ingest', directory])).toBe(1);
		expect(h.output).toEqual([]);
		expect(h.logger.error).toHaveBeenCalledWith(
			`[CLI] ingest failed: Files share a name and would produce the same chunk ids: 'notes.md' (${path.join(directory, 'a', 'notes.md')}, ${path.join(directory, 'b', 'notes.md')})`
		);
		expect(await (await app).index.count()).toBe(0);
	});

	it('prints the generated script for a test case file', async () => {
		const testCasePath = path.join(directory, 'case.json');
		const htmlPath = path.join(directory, 'checkout.html');
		await fs.writeFile(testCasePath, JSON.stringify([{ Test_ID: 'TC-001', Test_Scenario: 'Apply SAVE15' }]));
		await fs.writeFile(htmlPath, '<input id="discount">');
		const generator = new FakeGenerator('print("ok")');
		const h = harness(createTestApp({ generator }));

		expect(await runWith(h, ['script', testCasePath, htmlPath])).toBe(0);
		expect(h.output).toEqual(['print("ok")']);
		expect(generator.prompts[0]).toContain('HTML:\n<input id="discount">');
	});

	it('reports pipeline failures with a non-zero exit code', async () => {
		const h = harness(Promise.reject(new Error('Connection refused')));

		expect(await runWith(h, ['testcases', 'cart'])).toBe(1);
		expect(h.logger.error).toHaveBeenCalledWith('[CLI] testcases failed: Connection refused');
	});
});

describe('expandPaths', () => {
	let directory: string;

	beforeEach(async () => {
		directory = await fs.mkdtemp(path.join(os.tmpdir(), 'qa-forge-paths-'));
	});

	afterEach(async () => {
		await fs.rm(directory, { recursive: true, force: true });
	});

	it('walks directories in name order and skips hidden entries', async () => {
		await fs.mkdir(path.join(directory, 'nested'));
		await fs.writeFile(path.join(directory, 'b.md'), 'b');
		await fs.writeFile(path.join(directory, 'a.txt'), 'a');
		await fs.writeFile(path.join(directory, '.hidden'), 'x');
		await fs.writeFile(path.join(directory, 'nested', 'c.json'), '[]');
		const single = path.join(directory, 'b.md');

		expect(await expandPaths([directory, single])).toEqual([
			path.join(directory, 'a.txt'),
			path.join(directory, 'b.md'),
			path.join(directory, 'nested', 'c.json'),
			single,
		]);
	});

	it('fails on paths that do not exist', async () => {
		await expect(expandPaths([path.join(directory, 'missing')])).rejects.toThrow(/ENOENT/);
	});
});

describe('readTestCase', () => {
	it('rejects files without a test case object', async () => {
		const filePath = path.join(os.tmpdir(), `qa-forge-case-${process.pid}.json`);
		await fs.writeFile(filePath, '"just text"');

		await expect(readTestCase(filePath)).rejects.toThrow(`${filePath} does not contain a test case object`);
		await fs.rm(filePath, { force: true });
	});
});
