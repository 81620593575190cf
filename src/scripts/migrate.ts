import fs from "fs";
import path from "path";
import { closePool, initializePool } from "../db";

const SCHEMA_PATH = path.join(__dirname, "../db/schema.sql");

/**
 * Apply the settlement schema. Every statement is IF NOT EXISTS, so
 * running it twice is harmless.
 */
async function migrate(): Promise<void> {
  const sql = fs.readFileSync(SCHEMA_PATH, "utf8");
  const pool = initializePool();

  console.log(`📦 Applying schema from ${SCHEMA_PATH}`);
  await pool.query(sql);
  console.log("✅ Schema applied");
}

// Run if called directly
if (require.main === module) {
  migrate()
    .then(() => closePool())
    .then(() => process.exit(0))
    .catch((error) => {
      console.error("❌ Migration failed:", error);
      closePool()
        .catch((closeError) =>
          console.error("Failed to close database pool:", closeError)
        )
        .finally(() => process.exit(1));
    });
}

export { migrate };
