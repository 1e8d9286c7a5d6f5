import pg, { type Pool as PgPool } from 'pg';
import { getEnv } from '../config/env.js';

const { Pool } = pg;

let poolInstance: PgPool | null = null;

export function getPool(): PgPool {
  if (poolInstance) return poolInstance;

  const connectionString = getEnv().DATABASE_URL;
  if (!connectionString) {
    throw new Error('Missing DATABASE_URL environment variable');
  }

  poolInstance = new Pool({ connectionString, max: 10 });
  return poolInstance;
}

export async function closePool(): Promise<void> {
  if (!poolInstance) return;
  const pool = poolInstance;
  poolInstance = null;
  await pool.end();
}
