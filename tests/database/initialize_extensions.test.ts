import { describe, expect, it } from 'vitest';

import { initializeVectorExtension } from '../../src/database/connect/initialize_extensions';
import { createLogger } from '../helpers/fakes';
import { FakeSqlExecutor } from '../helpers/sql';

describe('initializeVectorExtension', () => {
	it('does nothing when pgvector is already active', async () => {
		const executor = new FakeSqlExecutor(() => [{ exists: true }]);

		expect(await initializeVectorExtension(executor, createLogger())).toBe(true);
		expect(executor.statements('CREATE EXTENSION')).toEqual([]);
	});

	it('creates the extension when it is missing', async () => {
		const answers = [[{ exists: false }], [], [{ exists: true }]];
		const executor = new FakeSqlExecutor(() => answers.shift());

		expect(await initializeVectorExtension(executor, createLogger())).toBe(true);
		expect(executor.statements('CREATE EXTENSION IF NOT EXISTS vector')).toHaveLength(1);
	});

	it('reports missing privileges', async () => {
		const logger = createLogger();
		const executor = new FakeSqlExecutor((sql) => {
			if (sql.startsWith('CREATE')) throw new Error('permission denied to create extension "vector"');
			return [{ exists: false }];
		});

		expect(await initializeVectorExtension(executor, logger)).toBe(false);
		expect(logger.error).toHaveBeenCalledWith('[DATABASE] Insufficient permissions to create vector extension. Contact your database administrator.');
	});

	it('fails when the extension still is not listed after creation', async () => {
		const executor = new FakeSqlExecutor((sql) => (sql.startsWith('CREATE') ? [] : [{ exists: false }]));

		expect(await initializeVectorExtension(executor, createLogger())).toBe(false);
	});
});
