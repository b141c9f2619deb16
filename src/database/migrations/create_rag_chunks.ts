import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Chunk table keyed by (collection, id). `embedding` is left without a fixed
 * dimensionality; the collection checks consistency itself.
 */
export class CreateRagChunks1729324800000 implements MigrationInterface {
	name = 'CreateRagChunks1729324800000';

	public async up(queryRunner: QueryRunner): Promise<void> {
		await queryRunner.query(`
			CREATE TABLE IF NOT EXISTS rag_chunks (
				collection varchar(255) NOT NULL,
				id varchar(512) NOT NULL,
				content text NOT NULL,
				source varchar(255) NOT NULL,
				"chunkIndex" integer NOT NULL,
				embedding vector NULL,
				"createdAt" timestamptz NOT NULL DEFAULT now(),
				"updatedAt" timestamptz NOT NULL DEFAULT now(),
				PRIMARY KEY (collection, id)
			)
		`);
	}

	public async down(queryRunner: QueryRunner): Promise<void> {
		await queryRunner.query('DROP TABLE IF EXISTS rag_chunks');
	}
}
