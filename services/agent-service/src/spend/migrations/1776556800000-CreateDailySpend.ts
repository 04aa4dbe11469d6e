import { MigrationInterface, QueryRunner, Table } from 'typeorm';

export class CreateDailySpend1776556800000 implements MigrationInterface {
  name = 'CreateDailySpend1776556800000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'daily_spend',
        columns: [
          { name: 'id', type: 'varchar', length: '64', isPrimary: true },
          { name: 'date', type: 'varchar', length: '10' },
          {
            name: 'total_cost',
            type: 'varchar',
            length: '32',
            default: "'0.000000'",
          },
          { name: 'request_count', type: 'integer', default: 0 },
          { name: 'input_tokens', type: 'integer', default: 0 },
          { name: 'output_tokens', type: 'integer', default: 0 },
          { name: 'last_updated', type: 'varchar', length: '32' },
          { name: 'version', type: 'integer', default: 0 },
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('daily_spend', true);
  }
}
