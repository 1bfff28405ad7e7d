import { createClient, type Client } from '@libsql/client';
import { drizzle, type LibSQLDatabase } from 'drizzle-orm/libsql';
import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import * as schema from './schema.js';
import * as joblistSchema from './joblist.schema.js';
import { ConnectionPool, type PoolOptions } from './pool.js';
import { migrateComplaintStore, migrateJobOrderStore } from './migrate.js';

export type ComplaintDb = LibSQLDatabase<typeof schema>;
export type JobOrderDb = LibSQLDatabase<typeof joblistSchema>;

export interface Stores {
  complaints: ConnectionPool<ComplaintDb>;
  jobOrders: ConnectionPool<JobOrderDb>;
  migrate(): Promise<void>;
  close(): void;
}

export interface StoreConfig {
  complaintsDbUrl: string;
  jobOrdersDbUrl: string;
  poolMax: number;
  poolAcquireTimeoutMs: number;
}

function openClient(url: string): Client {
  // file:data/x.db → make sure data/ exists
  if (url.startsWith('file:') && !url.includes(':memory:')) {
    mkdirSync(dirname(resolve(url.slice('file:'.length))), { recursive: true });
  }
  return createClient({ url });
}

export function openStores(config: StoreConfig): Stores {
  const options: PoolOptions = { max: config.poolMax, acquireTimeoutMs: config.poolAcquireTimeoutMs };

  const complaintClient = openClient(config.complaintsDbUrl);
  const jobOrderClient = openClient(config.jobOrdersDbUrl);

  const complaints = new ConnectionPool<ComplaintDb>(
    'complaints',
    drizzle(complaintClient, { schema }),
    options,
    () => complaintClient.close(),
  );
  const jobOrders = new ConnectionPool<JobOrderDb>(
    'joblist',
    drizzle(jobOrderClient, { schema: joblistSchema }),
    options,
    () => jobOrderClient.close(),
  );

  return {
    complaints,
    jobOrders,
    async migrate() {
      await migrateComplaintStore(complaintClient);
      await migrateJobOrderStore(jobOrderClient);
    },
    close() {
      complaints.close();
      jobOrders.close();
    },
  };
}

export { schema, joblistSchema };
