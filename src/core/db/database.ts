/**
 * Factor database access (read-only)
 *
 * The schema belongs to the Python collectors; the router only reads the
 * most recent collection date for the status report.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';

const LastDateRowSchema = z.object({
  last_date: z.union([z.string(), z.number()]).nullable(),
});

/**
 * Most recent `factor_data.date`, or null when the table is empty.
 * Throws when the file cannot be opened or the table does not exist.
 */
export function getLastCollectionDate(dbPath: string): string | null {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });

  try {
    const row = LastDateRowSchema.parse(
      db.prepare('SELECT MAX(date) AS last_date FROM factor_data').get()
    );
    return row.last_date === null ? null : String(row.last_date);
  } finally {
    db.close();
  }
}
