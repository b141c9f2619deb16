import { DataSource } from 'typeorm';

import { ILogger } from '../../types';
import { IndexUnavailable, errorMessage } from '../../utils/errors';
import { CreateRagChunks1729324800000 } from '../migrations/create_rag_chunks';
import { PostgresCollection } from '../repo/rag_chunk';
import { initializeVectorExtension } from './initialize_extensions';

export interface IPostgresConnectionOptions {
	uri: string;
	collectionName: string;
	debug?: boolean;
}

export const createDataSource = (uri: string, debug: boolean = false): DataSource => {
	return new DataSource({
		type: 'postgres',
		url: uri,
		synchronize: false,
		logging: debug,
		entities: [],
		migrations: [CreateRagChunks1729324800000],
		migrationsTableName: 'qa_forge_migrations',
	});
};

/**
 * Connects, enables pgvector, applies migrations and returns the collection.
 * The data source is destroyed when the collection is closed.
 * @throws {IndexUnavailable} When any of those steps fails
 */
export const openPostgresCollection = async (options: IPostgresConnectionOptions, logger: ILogger): Promise<PostgresCollection> => {
	const dataSource = createDataSource(options.uri, options.debug);

	try {
		await dataSource.initialize();
		logger.success('[DATABASE] Connected to PostgreSQL database');
	} catch (error) {
		logger.error(`[DATABASE] Error initializing PostgreSQL: ${errorMessage(error)}`);
		throw new IndexUnavailable(error);
	}

	try {
		const vectorSupported = await initializeVectorExtension(dataSource, logger);
		if (!vectorSupported) {
			throw new Error('pgvector extension is not available');
		}

		const applied = await dataSource.runMigrations({ transaction: 'each' });
		if (applied.length > 0) {
			logger.info(`[DATABASE] Applied ${applied.length} migration(s)`);
		}
	} catch (error) {
		await dataSource.destroy();
		throw new IndexUnavailable(error);
	}

	return new PostgresCollection(dataSource, {
		name: options.collectionName,
		logger,
		onClose: () => dataSource.destroy(),
	});
};
