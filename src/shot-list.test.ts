import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "path";
import { FatalIOError, InvalidPlanError } from "./errors";
import { loadShotList, parseShotList } from "./shot-list";
import { makeTempDir } from "./testing/fakes";

describe("parseShotList", () => {
  it("should accept a bare array or a shots object", () => {
    const shots = [{ idx: 0, description: "The harbor at night", variationType: "small" }];

    expect(parseShotList(shots)).toEqual(shots);
    expect(parseShotList({ shots })).toEqual(shots);
  });

  it("should resolve reference images against the base directory", () => {
    const [parsed] = parseShotList(
      [{ idx: 0, description: "Anna", variationType: "medium", referenceImagePaths: ["refs/anna.png"] }],
      "/project",
    );

    expect(parsed.referenceImagePaths).toEqual(["/project/refs/anna.png"]);
  });

  it("should reject empty lists, duplicates and invalid shots", () => {
    expect(() => parseShotList([])).toThrow("Shot list is empty");
    expect(() => parseShotList([
      { idx: 1, description: "a", variationType: "small" },
      { idx: 1, description: "b", variationType: "small" },
    ])).toThrow("Shot idx 1 appears more than once");
    expect(() => parseShotList([{ idx: 0, description: "a", variationType: "huge" }])).toThrow(InvalidPlanError);
  });
});

describe("loadShotList", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("should resolve references next to the shot list file", async () => {
    const file = join(dir, "shots.json");
    await writeFile(file, JSON.stringify({
      shots: [{ idx: 0, description: "Anna", variationType: "small", referenceImagePaths: ["anna.png"] }],
    }));

    const shots = await loadShotList(file);

    expect(shots[0].referenceImagePaths).toEqual([join(dir, "anna.png")]);
  });

  it("should report unreadable and malformed files", async () => {
    await expect(loadShotList(join(dir, "missing.json"))).rejects.toBeInstanceOf(FatalIOError);

    const file = join(dir, "broken.json");
    await writeFile(file, "[");
    await expect(loadShotList(file)).rejects.toBeInstanceOf(InvalidPlanError);
  });
});
