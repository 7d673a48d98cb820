import { describe, it, expect } from "vitest";
import { readSeedData, seedDataSchema } from "../seed-data";

function person(overrides: Record<string, unknown> = {}) {
  return {
    id: "1001",
    email: "1001@roster.local",
    name: "Person 1001",
    gender: "M",
    classLabel: "1A",
    year: 1,
    ...overrides,
  };
}

function seedWith(people: unknown[]) {
  return seedDataSchema.safeParse({ posts: [], people, roles: [], unavailability: [] });
}

describe("seedDataSchema", () => {
  it("should keep a starting punishment balance", () => {
    const result = seedWith([person({ punishmentBalance: 2 })]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.people[0].punishmentBalance).toBe(2);
  });

  it("should default the punishment balance to zero", () => {
    const result = seedWith([person()]);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.people[0].punishmentBalance).toBe(0);
  });

  it("should refuse a negative punishment balance", () => {
    const result = seedWith([person({ punishmentBalance: -1 })]);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0].path).toEqual(["people", 0, "punishmentBalance"]);
  });

  it("should accept a staff account without a class", () => {
    expect(seedWith([person({ id: "9000", classLabel: "", year: 0 })]).success).toBe(true);
  });
});

describe("readSeedData", () => {
  it("should load the bundled demo data with its punishment balance", () => {
    const data = readSeedData();

    expect(data.people.find((row) => row.id === "2002")?.punishmentBalance).toBe(1);
    expect(data.people.find((row) => row.id === "2001")?.punishmentBalance).toBe(0);
    expect(data.unavailability).toEqual([
      { userId: "1003", startsOn: "2030-01-06", endsOn: "2030-01-10", reason: "Medical leave" },
    ]);
  });
});
