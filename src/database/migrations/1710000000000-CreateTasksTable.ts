import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

/** The part of QueryRunner this migration uses */
type SchemaRunner = Pick<QueryRunner, 'createTable' | 'createIndex' | 'dropIndex' | 'dropTable'>;

export class CreateTasksTable1710000000000 implements MigrationInterface {
  name = 'CreateTasksTable1710000000000';

  public async up(queryRunner: SchemaRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'tasks',
        columns: [
          { name: 'id', type: 'uuid', isPrimary: true },
          { name: 'title', type: 'varchar', length: '200' },
          { name: 'description', type: 'text' },
          // No foreign key: users live in an external directory
          { name: 'owner_id', type: 'integer' },
          { name: 'status', type: 'varchar', length: '20', default: "'pending'" },
          { name: 'priority', type: 'varchar', length: '20', default: "'medium'" },
          { name: 'created_at', type: 'timestamptz' },
          { name: 'updated_at', type: 'timestamptz' },
          { name: 'completed_at', type: 'timestamptz', isNullable: true },
        ],
      }),
      true,
    );

    // Listing by owner
    await queryRunner.createIndex(
      'tasks',
      new TableIndex({
        name: 'idx_tasks_owner_id',
        columnNames: ['owner_id'],
      }),
    );

    // Status filters and active task counts
    await queryRunner.createIndex(
      'tasks',
      new TableIndex({
        name: 'idx_tasks_status',
        columnNames: ['status'],
      }),
    );

    // Creation-order listing
    await queryRunner.createIndex(
      'tasks',
      new TableIndex({
        name: 'idx_tasks_created_at',
        columnNames: ['created_at'],
      }),
    );
  }

  public async down(queryRunner: SchemaRunner): Promise<void> {
    await queryRunner.dropIndex('tasks', 'idx_tasks_created_at');
    await queryRunner.dropIndex('tasks', 'idx_tasks_status');
    await queryRunner.dropIndex('tasks', 'idx_tasks_owner_id');
    await queryRunner.dropTable('tasks');
  }
}
