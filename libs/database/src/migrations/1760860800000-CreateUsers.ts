import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Creates the users table.
 *
 * Hand-written to match the User entity. The SQL is SQLite-specific:
 * UUIDs are generated by TypeORM on insert and stored as varchar, booleans
 * are stored as 0/1.
 */
export class CreateUsers1760860800000 implements MigrationInterface {
  name = 'CreateUsers1760860800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"              varchar PRIMARY KEY NOT NULL,
        "email"           varchar(255) NOT NULL,
        "password_hash"   varchar(255) NOT NULL,
        "full_name"       varchar(255) NOT NULL,
        "email_confirmed" boolean NOT NULL DEFAULT (0),
        "security_stamp"  varchar(64) NOT NULL,
        "created_at"      datetime NOT NULL DEFAULT (datetime('now')),
        "updated_at"      datetime NOT NULL DEFAULT (datetime('now'))
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_email" ON "users" ("email")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_users_email"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
