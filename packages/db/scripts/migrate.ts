import "dotenv/config";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { createDatabase } from "../src";

const migrationsFolder = fileURLToPath(new URL("../migrations", import.meta.url));

/** Applies the SQL written by `npm run db:generate`, in order, once each. */
async function run() {
  const { db, pool } = createDatabase(process.env.DATABASE_URL ?? "");
  try {
    await migrate(db, { migrationsFolder });
    console.log(`Applied migrations from ${migrationsFolder}.`);
  } finally {
    await pool.end();
  }
}

run().catch((error: unknown) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
