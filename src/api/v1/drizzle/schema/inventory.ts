import { sql } from 'drizzle-orm';
import { check, integer, pgTable, serial, timestamp, unique } from 'drizzle-orm/pg-core';
import { productTable } from './product';
import { warehouseTable } from './warehouse';

export const inventoryTable = pgTable('inventory', {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    productId: integer('product_id').references(() => productTable.id, { onDelete: 'cascade' }).notNull(),
    warehouseId: integer('warehouse_id').references(() => warehouseTable.id, { onDelete: 'cascade' }).notNull(),
    quantity: integer('quantity').notNull().default(0),
}, (table) => [
    unique('inventory_product_warehouse_unique').on(table.productId, table.warehouseId),
    check('inventory_quantity_non_negative', sql`${table.quantity} >= 0`),
]);

export type InventoryTable = typeof inventoryTable.$inferSelect;
export type NewInventory = typeof inventoryTable.$inferInsert;
