import type { Knex } from "knex";


export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', (table) => {
    table.increments('id').primary();
    table.string('username').unique().notNullable();
    table.boolean('email_verified').notNullable().defaultTo(false);
    table.timestamps(true, true);
  });

  await knex.schema.createTable('bingo_cards', (table) => {
    table.string('id').primary();
    table.integer('user_id').unsigned().notNullable();
    table.integer('year').notNullable();
    table.string('title', 100).nullable();
    table.string('category', 50).nullable();
    table.integer('grid_size').notNullable().defaultTo(5);
    table.string('header_text', 10).notNullable().defaultTo('BINGO');
    table.boolean('has_free_space').notNullable().defaultTo(true);
    table.integer('free_space_position').nullable();
    table.boolean('is_finalized').notNullable().defaultTo(false);
    table.boolean('is_archived').notNullable().defaultTo(false);
    table.boolean('visible_to_friends').notNullable().defaultTo(true);
    table.string('created_at').notNullable();
    table.string('updated_at').notNullable();
    table.foreign('user_id').references('users.id').onDelete('CASCADE');

    table.index(['user_id']);
    table.unique(['user_id', 'year', 'title'], { indexName: 'idx_bingo_cards_user_year_title' });
    table.check('grid_size BETWEEN 2 AND 5');
  });

  // NULL titles are distinct to a plain unique index, so untitled cards need their own
  await knex.raw(
    'CREATE UNIQUE INDEX idx_bingo_cards_user_year_null_title ON bingo_cards (user_id, year) WHERE title IS NULL',
  );

  await knex.schema.createTable('bingo_items', (table) => {
    table.string('id').primary();
    table.string('card_id').notNullable();
    table.integer('position').notNullable();
    table.text('content').notNullable();
    table.boolean('is_completed').notNullable().defaultTo(false);
    table.string('completed_at').nullable();
    table.text('notes').nullable();
    table.text('proof_url').nullable();
    table.string('created_at').notNullable();
    table.foreign('card_id').references('bingo_cards.id').onDelete('CASCADE');

    table.unique(['card_id', 'position'], { indexName: 'idx_bingo_items_card_position' });
    table.check('position >= 0 AND position < 25');
  });
}


export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('bingo_items');
  await knex.raw('DROP INDEX IF EXISTS idx_bingo_cards_user_year_null_title');
  await knex.schema.dropTableIfExists('bingo_cards');
  await knex.schema.dropTableIfExists('users');
}
