import { z } from 'zod';

import { ILogger } from '../../types';
import { errorMessage } from '../../utils/errors';
import { ISqlExecutor } from '../repo/rag_chunk';

const ExistsRows = z.array(z.object({ exists: z.boolean() }));

const vectorExtensionExists = async (executor: ISqlExecutor): Promise<boolean> => {
	const rows = ExistsRows.parse(await executor.query("SELECT EXISTS (SELECT 1 FROM pg_extension WHERE extname = 'vector') AS exists"));
	return rows[0]?.exists ?? false;
};

/**
 * Makes sure the pgvector extension is active, creating it when permitted
 * @returns {Promise<boolean>} false when the extension cannot be made available
 */
export const initializeVectorExtension = async (executor: ISqlExecutor, logger: ILogger): Promise<boolean> => {
	if (await vectorExtensionExists(executor)) {
		logger.debug('[DATABASE] Vector extension is already active');
		return true;
	}

	try {
		await executor.query('CREATE EXTENSION IF NOT EXISTS vector');
	} catch (error) {
		const message = errorMessage(error);
		if (message.includes('permission denied') || message.includes('must be owner')) {
			logger.error('[DATABASE] Insufficient permissions to create vector extension. Contact your database administrator.');
		} else if (message.includes('could not open extension control file') || message.includes('extension "vector" is not available')) {
			logger.error('[DATABASE] pgvector extension is not available in this database instance. Please install pgvector or use a database service that supports it.');
		} else {
			logger.error(`[DATABASE] Failed to create vector extension: ${message}`);
		}
		return false;
	}

	if (!(await vectorExtensionExists(executor))) {
		logger.warn('[DATABASE] Vector extension installation verification failed');
		return false;
	}

	logger.info('[DATABASE] Vector extension created successfully');
	return true;
};
