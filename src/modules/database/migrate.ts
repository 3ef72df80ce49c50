import 'dotenv/config';
import { drizzle } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import pg from 'pg';

const { Pool } = pg;

/**
 * Run database migrations
 *
 * Applies the Drizzle migrations generated by `npm run db:generate` from
 * ./migrations (settings and upload_ledger tables).
 */
async function runMigrations() {
  const connectionString = process.env.DATABASE_URL;

  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  console.log('Connecting to database...');
  const pool = new Pool({ connectionString });
  const db = drizzle(pool);

  try {
    console.log('Running Drizzle migrations...');
    await migrate(db, { migrationsFolder: './migrations' });
    console.log('All migrations completed successfully!');
  } catch (error) {
    console.error('Migration failed:', error);
    throw error;
  } finally {
    await pool.end();
  }
}

// Run migrations if this file is executed directly
runMigrations().catch((error) => {
  console.error('Migration script failed:', error);
  process.exit(1);
});
