import type { Knex } from "knex";


export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('generation_quotas', (table) => {
    table.integer('user_id').unsigned().primary();
    table.integer('used').notNullable().defaultTo(0);
    table.string('updated_at').notNullable();
    table.foreign('user_id').references('users.id').onDelete('CASCADE');

    table.check('used >= 0');
  });
}


export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('generation_quotas');
}
