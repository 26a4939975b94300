import { pgTable, serial, timestamp, varchar } from 'drizzle-orm/pg-core';

export const companyTable = pgTable('company', {
    id: serial('id').primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    name: varchar('name', { length: 255 }).notNull().unique('company_name_unique'),
});

export type CompanyTable = typeof companyTable.$inferSelect;
export type NewCompany = typeof companyTable.$inferInsert;
