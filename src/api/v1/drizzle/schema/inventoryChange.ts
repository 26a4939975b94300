import { index, integer, pgEnum, pgTable, serial, timestamp, varchar } from 'drizzle-orm/pg-core';
import { inventoryTable } from './inventory';

export const inventoryChangeTypeEnum = pgEnum('inventory_change_type', ['sale', 'restock', 'adjustment']);

// Append-only stock movement ledger; rows are written by the ingestion side and never updated
export const inventoryChangeTable = pgTable('inventory_change', {
    id: serial('id').primaryKey(),
    inventoryId: integer('inventory_id').references(() => inventoryTable.id, { onDelete: 'cascade' }).notNull(),
    changeType: inventoryChangeTypeEnum('change_type').notNull(),
    // negative when stock leaves the warehouse
    quantityDelta: integer('quantity_delta').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).defaultNow().notNull(),
    reference: varchar('reference', { length: 255 }),
}, (table) => [
    index('inventory_change_inventory_occurred_idx').on(table.inventoryId, table.occurredAt),
]);

export type InventoryChangeTable = typeof inventoryChangeTable.$inferSelect;
export type NewInventoryChange = typeof inventoryChangeTable.$inferInsert;
export type InventoryChangeType = (typeof inventoryChangeTypeEnum.enumValues)[number];
