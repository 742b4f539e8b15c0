import mongoose, { mongo } from 'mongoose';
import { connectDB } from '../utils/db';
import { logger } from '../utils/logger';
import { LEGACY_SALES_MANAGERS_COLLECTION, SALES_MANAGERS_COLLECTION } from '../models/salesManager.model';

export interface MigrationReport {
  scanned: number;
  copied: number;
  skipped: number;
}

export interface LegacySalesManagers {
  find(): AsyncIterable<mongo.Document>;
}

export interface SalesManagerStore {
  findOne(filter: mongo.Filter<mongo.Document>, options: mongo.FindOptions): Promise<mongo.Document | null>;
  insertOne(doc: mongo.Document): Promise<unknown>;
}

/**
 * Copies sales managers from the legacy collection into the canonical one.
 * Documents already present (same `_id` or same email) are left alone and
 * nothing is deleted, so the migration can be re-run.
 */
export const migrateSalesManagers = async (
  legacy: LegacySalesManagers,
  canonical: SalesManagerStore,
): Promise<MigrationReport> => {
  const report: MigrationReport = { scanned: 0, copied: 0, skipped: 0 };

  for await (const doc of legacy.find()) {
    report.scanned++;
    const email = typeof doc.email === 'string' ? doc.email.toLowerCase() : undefined;
    const existing = await canonical.findOne(
      email ? { $or: [{ _id: doc._id }, { email }] } : { _id: doc._id },
      { projection: { _id: 1 } },
    );
    if (existing) {
      report.skipped++;
      continue;
    }
    await canonical.insertOne({ ...doc, ...(email ? { email } : {}) });
    report.copied++;
  }

  return report;
};

if (require.main === module) {
  connectDB()
    .then(() => {
      const { db } = mongoose.connection;
      if (!db) throw new Error('MongoDB connection has no database handle');
      return migrateSalesManagers(
        db.collection(LEGACY_SALES_MANAGERS_COLLECTION),
        db.collection(SALES_MANAGERS_COLLECTION),
      );
    })
    .then((report) => {
      logger.info('Sales manager migration finished', report);
      return mongoose.disconnect();
    })
    .catch((err: unknown) => {
      logger.error('Sales manager migration failed', { error: err });
      process.exitCode = 1;
      return mongoose.disconnect();
    });
}
