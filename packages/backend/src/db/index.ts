import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { config, toPoolConfig } from '../config/index.js';
import * as schema from './schema.js';

export type Database = NodePgDatabase<typeof schema>;

// Create connection pool; the worker holds one transaction per reconciliation pass
const pool = new Pool(toPoolConfig(config));

// Handle pool errors
pool.on('error', (err) => {
  console.error('Unexpected error on idle database client', err);
});

// Create drizzle instance with schema
export const db: Database = drizzle(pool, { schema });

// Export pool for health checks and cleanup
export { pool };

// Export schema for convenience
export * from './schema.js';

// Health check function
export async function checkDatabaseConnection(): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
    return true;
  } catch (error) {
    console.error('Database connection check failed:', error);
    return false;
  }
}

// Run database migrations on startup
export async function runMigrations(): Promise<void> {
  const client = await pool.connect();
  try {
    console.log('Running database migrations...');

    // Create tables (idempotent with IF NOT EXISTS)
    await client.query(`CREATE TABLE IF NOT EXISTS venues (internal_venue_id VARCHAR(100) PRIMARY KEY, name VARCHAR(255) NOT NULL, city VARCHAR(100), state_province VARCHAR(100), country_code VARCHAR(2), timezone VARCHAR(64), created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW() NOT NULL)`);
    await client.query(`CREATE TABLE IF NOT EXISTS events (internal_event_id VARCHAR(100) PRIMARY KEY, name VARCHAR(255) NOT NULL, created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW() NOT NULL)`);
    await client.query(`CREATE TABLE IF NOT EXISTS performances (internal_performance_id VARCHAR(100) PRIMARY KEY, event_id VARCHAR(100) NOT NULL REFERENCES events(internal_event_id) ON DELETE CASCADE, venue_id VARCHAR(100) NOT NULL REFERENCES venues(internal_venue_id) ON DELETE CASCADE, name VARCHAR(255), performance_datetime_utc TIMESTAMP WITH TIME ZONE, pos_enabled BOOLEAN NOT NULL DEFAULT false, created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW() NOT NULL)`);
    await client.query(`CREATE TABLE IF NOT EXISTS seat_packs (internal_pack_id VARCHAR(200) PRIMARY KEY, performance_id VARCHAR(100) NOT NULL REFERENCES performances(internal_performance_id) ON DELETE CASCADE, source_website VARCHAR(100) NOT NULL, zone_id VARCHAR(100) NOT NULL, level_id VARCHAR(100), section_id VARCHAR(100), row_label VARCHAR(50) NOT NULL, start_seat_number VARCHAR(20) NOT NULL, end_seat_number VARCHAR(20) NOT NULL, pack_size INTEGER NOT NULL CHECK (pack_size > 0), pack_price NUMERIC(10,2) NOT NULL CHECK (pack_price >= 0), total_price NUMERIC(12,2) NOT NULL CHECK (total_price >= 0), seat_keys JSONB NOT NULL, source_pack_ids JSONB NOT NULL DEFAULT '[]', pack_status VARCHAR(20) NOT NULL DEFAULT 'active', delist_reason VARCHAR(30), delisted_at TIMESTAMP WITH TIME ZONE, pack_state VARCHAR(20) NOT NULL DEFAULT 'create', pos_status VARCHAR(20) NOT NULL DEFAULT 'pending', synced_to_pos BOOLEAN NOT NULL DEFAULT false, pos_inventory_id VARCHAR(100), pos_sync_attempts INTEGER NOT NULL DEFAULT 0, pos_last_error TEXT, manual_delisted_by VARCHAR(255), manual_delisted_at TIMESTAMP WITH TIME ZONE, created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW() NOT NULL, updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW() NOT NULL)`);

    // Create indexes (idempotent)
    await client.query(`CREATE INDEX IF NOT EXISTS idx_performances_event_id ON performances(event_id)`);
    await client.query(`CREATE INDEX IF NOT EXISTS idx_performances_venue_id ON performances(venue_id)`);
    await client.query(`CREATE INDEX IF NOT EXISTS idx_seat_packs_performance_status ON seat_packs(performance_id, pack_status)`);
    await client.query(`CREATE INDEX IF NOT EXISTS idx_seat_packs_pos_status ON seat_packs(pos_status, synced_to_pos)`);

    console.log('Database migrations completed successfully');
  } finally {
    client.release();
  }
}

// Graceful shutdown
export async function closeDatabaseConnection(): Promise<void> {
  await pool.end();
}
