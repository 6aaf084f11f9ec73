import { createDatabase, createPool } from './index.js';
import { bootstrapSchema, findMissingTables } from './bootstrap.js';

async function runMigrations() {
  console.log('Bootstrapping schema...');

  const pool = createPool();
  const db = createDatabase(pool);

  try {
    await bootstrapSchema(db);
    const missing = await findMissingTables(db);
    if (missing.length > 0) {
      throw new Error(`Missing tables after bootstrap: ${missing.join(', ')}`);
    }
    console.log('Schema ready.');
  } finally {
    await pool.end();
  }
}

runMigrations().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
