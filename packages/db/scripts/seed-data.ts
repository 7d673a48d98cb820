import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { genderRestrictionSchema, genderSchema, idSchema, isoDateSchema } from "@escala/schema";

export const seedDataSchema = z.object({
  posts: z.array(
    z.object({
      name: z.string().min(1),
      genderRestriction: genderRestrictionSchema,
      eligibleYears: z.string().regex(/^ *[0-9]+ *(, *[0-9]+ *)*$/),
      priorityWeight: z.number().int(),
    }),
  ),
  people: z.array(
    z.object({
      id: idSchema,
      email: z.string().email(),
      name: z.string().min(1),
      gender: genderSchema,
      // Staff accounts (the scheduler) carry no class and year 0.
      classLabel: z.string(),
      year: z.number().int().min(0),
      punishmentBalance: z.number().int().min(0).default(0),
    }),
  ),
  roles: z.array(z.object({ userId: idSchema, role: z.string().min(1) })),
  unavailability: z.array(
    z.object({
      userId: idSchema,
      startsOn: isoDateSchema,
      endsOn: isoDateSchema,
      reason: z.string().optional(),
    }),
  ),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export function readSeedData(file = fileURLToPath(new URL("./seed-data.json", import.meta.url))): SeedData {
  return seedDataSchema.parse(JSON.parse(readFileSync(file, "utf8")));
}
