import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Creates the `users` table backing the credential store.
 *
 * Hand-written to match the User entity exactly. The unique index on
 * `username` is what enforces uniqueness under concurrent registration.
 */
export class CreateUsers1760832000000 implements MigrationInterface {
  name = 'CreateUsers1760832000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "username"      varchar(100) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "is_admin"      boolean NOT NULL DEFAULT false,
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "IDX_users_username" ON "users" ("username")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_users_username"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
  }
}
