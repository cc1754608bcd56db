/**
 * Applies pending migrations, then checks that every table the service
 * queries exists. Run: npm run migrate (from the repo root)
 */
import "../src/env";
import { pool } from "../src/db";
import { errorMessage } from "../src/errors";
import { logError, logInfo } from "../src/logger";
import { runMigrations, verifySchema } from "../src/migrations";

async function migrate() {
  const { applied, drifted } = await runMigrations();
  await verifySchema();
  logInfo("MIGRATIONS_COMPLETE", { applied, drifted });
}

migrate()
  .then(() => pool.end())
  .catch(async (error: unknown) => {
    logError("MIGRATIONS_FAILED", { error: errorMessage(error) });
    await pool.end();
    process.exit(1);
  });
