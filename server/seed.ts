import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { IStorage } from "./storage";
import { insertTenantSchema } from "@shared/schema";
import { log } from "./logger";

const DEFAULT_SEED_FILE = fileURLToPath(new URL("./data/seed-tenants.json", import.meta.url));

const seedFileSchema = z.array(insertTenantSchema);

/** Create the tenants listed in the seed file that do not exist yet. Returns how many were created. */
export async function seedTenants(storage: IStorage, file: string = DEFAULT_SEED_FILE): Promise<number> {
  const raw: unknown = JSON.parse(await readFile(file, "utf8"));
  const seeds = seedFileSchema.parse(raw);

  let created = 0;
  for (const seed of seeds) {
    if (await storage.getTenantBySlug(seed.slug)) continue;
    await storage.createTenant(seed);
    created++;
  }

  if (created > 0) log(`Seeded ${created} tenants`, "seed");
  return created;
}
