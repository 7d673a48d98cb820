import "dotenv/config";
import { and, eq } from "drizzle-orm";
import { createDatabase, posts, unavailabilityWindows, userRoles, users } from "../src/index";
import { readSeedData } from "./seed-data";

/**
 * Loads demo posts, people and scheduler roles.
 *
 * Re-runnable: posts and people upsert on their natural keys, fairness
 * counters and punishment balances are left untouched on existing rows, and
 * an unavailability window is only inserted when the same person and range
 * is not already on file.
 */
async function seed() {
  const data = readSeedData();
  const { db, pool } = createDatabase(process.env.DATABASE_URL ?? "");

  try {
    for (const post of data.posts) {
      await db
        .insert(posts)
        .values(post)
        .onConflictDoUpdate({
          target: posts.name,
          set: {
            genderRestriction: post.genderRestriction,
            eligibleYears: post.eligibleYears,
            priorityWeight: post.priorityWeight,
          },
        });
    }

    for (const person of data.people) {
      await db
        .insert(users)
        .values(person)
        .onConflictDoUpdate({
          target: users.id,
          set: {
            name: person.name,
            gender: person.gender,
            classLabel: person.classLabel,
            year: person.year,
          },
        });
    }

    if (data.roles.length > 0) {
      await db.insert(userRoles).values(data.roles).onConflictDoNothing();
    }

    for (const entry of data.unavailability) {
      const existing = await db
        .select({ id: unavailabilityWindows.id })
        .from(unavailabilityWindows)
        .where(
          and(
            eq(unavailabilityWindows.userId, entry.userId),
            eq(unavailabilityWindows.startsOn, entry.startsOn),
            eq(unavailabilityWindows.endsOn, entry.endsOn),
          ),
        )
        .limit(1);
      if (existing.length === 0) {
        await db.insert(unavailabilityWindows).values(entry);
      }
    }

    console.log(
      `Seeded ${data.posts.length} posts, ${data.people.length} people, ${data.roles.length} roles.`,
    );
  } finally {
    await pool.end();
  }
}

seed().catch((error) => {
  console.error("Seed failed:", error);
  process.exit(1);
});
