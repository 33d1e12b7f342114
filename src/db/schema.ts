import { pgTable, serial, text, date, timestamp } from 'drizzle-orm/pg-core'

// Users table
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  // Date-only value, kept as the YYYY-MM-DD string end to end
  dob: date('dob', { mode: 'string' }).notNull(),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
})

// Type exports for TypeScript
export type User = typeof users.$inferSelect
