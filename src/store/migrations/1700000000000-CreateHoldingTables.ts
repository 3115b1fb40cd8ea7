import { MigrationInterface, QueryRunner } from 'typeorm';

// Leaves a store written by an earlier run untouched: both statements are
// no-ops when the table already exists, whatever columns it carries.
export class CreateHoldingTables1700000000000 implements MigrationInterface {
  name = 'CreateHoldingTables1700000000000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TABLE IF NOT EXISTS stocks (
        purchase_id TEXT PRIMARY KEY,
        symbol TEXT,
        quantity INTEGER,
        purchase_price REAL,
        current_price REAL,
        purchase_date TEXT
      )`,
    );
    await queryRunner.query(
      `CREATE TABLE IF NOT EXISTS bonds (
        purchase_id TEXT PRIMARY KEY,
        symbol TEXT,
        quantity INTEGER,
        purchase_price REAL,
        current_price REAL,
        coupon REAL,
        yield_rate REAL,
        purchase_date TEXT
      )`,
    );
  }

  // Holdings outlive the schema version; nothing is dropped on revert.
  async down(): Promise<void> {}
}
