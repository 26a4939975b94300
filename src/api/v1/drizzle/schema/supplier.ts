import { pgTable, serial, timestamp, varchar } from 'drizzle-orm/pg-core';

export const supplierTable = pgTable('supplier', {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    name: varchar('name', { length: 255 }).notNull().unique('supplier_name_unique'),
    contactEmail: varchar('contact_email', { length: 255 }),
});

export type SupplierTable = typeof supplierTable.$inferSelect;
export type NewSupplier = typeof supplierTable.$inferInsert;
