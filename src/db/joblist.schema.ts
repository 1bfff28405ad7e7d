import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

// Denormalized job orders consumed by the field crew system. No link back to complaints.
export const jobOrders = sqliteTable('job_orders', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  uniqueId: text('unique_id').notNull().unique(),
  creator: text('creator').notNull(),
  created: text('created').notNull(),              // MM/dd/yy hh:mm:ss a
  follower: text('follower').notNull(),
  followed: text('followed').notNull(),
  name: text('name').notNull(),
  spinners: text('spinners').notNull(),
  town0: text('town0').notNull(),
  brgy0: text('brgy0').notNull(),
  town: text('town').notNull(),
  brgy: text('brgy').notNull(),
  town2: text('town2').notNull(),
  brgy2: text('brgy2').notNull(),
  assignedto: text('assignedto').notNull(),
  status: text('status').notNull(),
  subs: text('subs').notNull(),
  feeder: text('feeder').notNull(),
  section: text('section').notNull(),
  cause: text('cause').notNull(),
  equip: text('equip').notNull(),
  type: text('type').notNull(),                    // high | low
  notes: text('notes').notNull(),
  landmark: text('landmark').notNull(),
  phone: text('phone').notNull(),
  location: text('location').notNull(),
  latitude: text('latitude').notNull(),
  longitude: text('longitude').notNull(),
  actiontaken: text('actiontaken').notNull(),
});

export type JobOrderRow = typeof jobOrders.$inferInsert;
