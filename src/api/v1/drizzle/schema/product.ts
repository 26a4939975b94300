import { integer, numeric, pgTable, serial, timestamp, varchar } from 'drizzle-orm/pg-core';
import { supplierTable } from './supplier';

export const productTable = pgTable('product', {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    sku: varchar('sku', { length: 64 }).notNull().unique('product_sku_unique'),
    // string mode keeps the exact decimal value, never a JS float
    price: numeric('price', { precision: 12, scale: 2 }).notNull(),
    lowStockThreshold: integer('low_stock_threshold'),
    supplierId: integer('supplier_id').references(() => supplierTable.id),
});

export type ProductTable = typeof productTable.$inferSelect;
export type NewProduct = typeof productTable.$inferInsert;
