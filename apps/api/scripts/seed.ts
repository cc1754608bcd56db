/**
 * Seed script: spring types, defect codes, inspection activities and
 * inspectors from scripts/seed-data/master-data.json. Re-runnable.
 * Run: npm run seed (from the repo root)
 */
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { CoachTypeEnum } from "@spring-shop/shared";
import { getClient, pool } from "../src/db";

const SEED_FILE = path.resolve(__dirname, "seed-data", "master-data.json");

const SeedFileSchema = z.object({
  springTypes: z.array(
    z.object({
      name: z.string().min(1),
      coachTypes: z.array(CoachTypeEnum),
      maxPerBogie: z.number().int().min(0).nullable(),
    })
  ),
  defectTypes: z.array(z.object({ code: z.string().min(1), name: z.string().min(1) })),
  activities: z.array(
    z.object({
      type: z.enum(["VISUAL_INSPECTION", "MUST_DO"]),
      sequence: z.number().int(),
      text: z.string().min(1),
    })
  ),
  inspectors: z.array(z.string().min(1)),
});

type SeedFile = z.infer<typeof SeedFileSchema>;

async function readSeedFile(): Promise<SeedFile> {
  const raw = await fs.readFile(SEED_FILE, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown parse error";
    throw new Error(`[SEED_INVALID_JSON] ${SEED_FILE}: ${message}`);
  }
  return SeedFileSchema.parse(parsed);
}

async function seed() {
  const data = await readSeedFile();
  const client = await getClient();
  try {
    await client.query("BEGIN");

    for (const springType of data.springTypes) {
      await client.query(
        `INSERT INTO spring_types (spring_type, coach_types, max_per_bogie)
         VALUES ($1, $2, $3)
         ON CONFLICT (spring_type) DO UPDATE
           SET coach_types = EXCLUDED.coach_types, max_per_bogie = EXCLUDED.max_per_bogie`,
        [springType.name, springType.coachTypes, springType.maxPerBogie]
      );
    }

    for (const defect of data.defectTypes) {
      await client.query(
        `INSERT INTO defect_types (defect_code, defect_name) VALUES ($1, $2)
         ON CONFLICT (defect_code) DO UPDATE SET defect_name = EXCLUDED.defect_name`,
        [defect.code, defect.name]
      );
    }

    for (const activity of data.activities) {
      await client.query(
        `INSERT INTO inspection_activities (activity_text, activity_type, sequence_number, is_active)
         VALUES ($1, $2, $3, TRUE)
         ON CONFLICT (activity_type, activity_text) DO UPDATE
           SET sequence_number = EXCLUDED.sequence_number, is_active = TRUE`,
        [activity.text, activity.type, activity.sequence]
      );
    }

    for (const name of data.inspectors) {
      await client.query(
        `INSERT INTO inspectors (name, is_active) VALUES ($1, TRUE)
         ON CONFLICT (name) DO UPDATE SET is_active = TRUE`,
        [name]
      );
    }

    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }

  console.log(
    `Seeded ${data.springTypes.length} spring types, ${data.defectTypes.length} defect types, ` +
      `${data.activities.length} activities, ${data.inspectors.length} inspectors.`
  );
}

seed()
  .then(() => pool.end())
  .catch(async (error: unknown) => {
    console.error("Seed failed:", error instanceof Error ? error.message : String(error));
    await pool.end();
    process.exit(1);
  });
