import crypto from "crypto";
import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { Client } from "pg";

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const MIGRATION_FILENAME_RE = /^[0-9]{3}_[A-Za-z0-9_-]+\.sql$/;

function hashFile(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return crypto.createHash("sha256").update(content).digest("hex");
}

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error("ERROR: DATABASE_URL not set in environment");
    process.exit(1);
  }
  console.log(`Running migrations against: ${databaseUrl.replace(/:[^:@]+@/, ":****@")}`);

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    await client.query(`CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      content_hash TEXT
    )`);

    const applied = await client.query<{ filename: string; content_hash: string | null }>(
      "SELECT filename, content_hash FROM schema_migrations ORDER BY filename"
    );
    const appliedMap = new Map<string, string>();
    for (const row of applied.rows) {
      appliedMap.set(row.filename, row.content_hash ?? "");
    }

    const migrationDir = path.resolve(__dirname, "..", "migrations");
    const migrations = fs
      .readdirSync(migrationDir)
      .filter((entry) => MIGRATION_FILENAME_RE.test(entry))
      .sort((a, b) => a.localeCompare(b, "en"));

    // Drift: an applied file whose content changed on disk
    let driftCount = 0;
    for (const migration of migrations) {
      const storedHash = appliedMap.get(migration);
      if (!storedHash) continue;
      const diskHash = hashFile(path.join(migrationDir, migration));
      if (diskHash !== storedHash) {
        console.warn(
          `  WARNING: ${migration} has changed since it was applied (expected ${storedHash.slice(0, 12)}…, got ${diskHash.slice(0, 12)}…)`
        );
        driftCount++;
      }
    }
    if (driftCount > 0) {
      console.warn(`\n${driftCount} migration(s) have drifted from their applied versions. Review before proceeding.\n`);
    }

    let ranCount = 0;
    for (const migration of migrations) {
      if (appliedMap.has(migration)) continue;

      console.log(`\nRunning ${migration}...`);
      const filePath = path.join(migrationDir, migration);
      const sql = fs.readFileSync(filePath, "utf-8");
      const contentHash = hashFile(filePath);
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (filename, content_hash) VALUES ($1, $2)", [
          migration,
          contentHash,
        ]);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw new Error(`${migration} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
      console.log(`  ${migration} completed (hash: ${contentHash.slice(0, 12)}…)`);
      ranCount++;
    }

    if (ranCount === 0) {
      console.log("\nAll migrations already applied, nothing to do.");
    } else {
      console.log(`\n${ranCount} migration(s) applied successfully!`);
    }
  } finally {
    await client.end();
  }
}

main().catch((error) => {
  console.error("[MIGRATION_FAILED]", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
