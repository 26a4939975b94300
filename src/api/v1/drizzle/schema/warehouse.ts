import { integer, pgTable, serial, timestamp, unique, varchar } from 'drizzle-orm/pg-core';
import { companyTable } from './company';

export const warehouseTable = pgTable('warehouse', {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    companyId: integer('company_id').references(() => companyTable.id, { onDelete: 'cascade' }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    location: varchar('location', { length: 255 }),
}, (table) => [
    unique('warehouse_company_name_unique').on(table.companyId, table.name),
]);

export type WarehouseTable = typeof warehouseTable.$inferSelect;
export type NewWarehouse = typeof warehouseTable.$inferInsert;
