import { describe, expect, it } from "vitest";
import { makeRecord, makeSnapshot } from "../testing/fixtures.js";
import {
  buildProfile,
  clampScore,
  languagePercentages,
  rankLanguages,
  rebuildProfile,
  summarizeRepositories,
} from "./aggregate.js";

describe("summarizeRepositories", () => {
  it("sums stars, forks and language bytes by key", () => {
    const totals = summarizeRepositories([
      makeRecord("a", { stars: 5, forks: 1, languages: { TypeScript: 300, CSS: 20 } }),
      makeRecord("b", { stars: 7, forks: 2, languages: { TypeScript: 100, Go: 50 } }),
    ]);

    expect(totals).toEqual({
      totalStars: 12,
      totalForks: 3,
      languagesUsed: { TypeScript: 400, CSS: 20, Go: 50 },
    });
  });

  it("returns zeroes and an empty histogram for no repositories", () => {
    expect(summarizeRepositories([])).toEqual({ totalStars: 0, totalForks: 0, languagesUsed: {} });
  });
});

describe("languagePercentages", () => {
  it("normalizes byte counts to percentages", () => {
    expect(languagePercentages({ Python: 800, JavaScript: 200 })).toEqual({
      Python: 80,
      JavaScript: 20,
    });
  });

  it("does not divide by zero when every count is zero", () => {
    expect(languagePercentages({ Shell: 0 })).toEqual({ Shell: 0 });
  });
});

describe("rankLanguages", () => {
  it("orders by bytes and breaks ties by name", () => {
    expect(rankLanguages({ Ruby: 100, C: 100, Zig: 50, Ada: 100 })).toEqual([
      "Ada",
      "C",
      "Ruby",
      "Zig",
    ]);
  });

  it("keeps at most ten languages", () => {
    const histogram: Record<string, number> = {};
    for (let i = 0; i < 12; i++) histogram[`Lang${i}`] = 1000 - i;

    const ranked = rankLanguages(histogram);

    expect(ranked).toHaveLength(10);
    expect(ranked[0]).toBe("Lang0");
    expect(ranked[9]).toBe("Lang9");
  });
});

describe("clampScore", () => {
  it("bounds values to 0..100", () => {
    expect(clampScore(-5)).toBe(0);
    expect(clampScore(42.5)).toBe(42.5);
    expect(clampScore(250)).toBe(100);
    expect(clampScore(Number.NaN)).toBe(0);
  });
});

describe("buildProfile", () => {
  it("yields the language distribution of a single repository", () => {
    const profile = buildProfile(
      makeSnapshot([makeRecord("tool", { languages: { Python: 800, JavaScript: 200 } })]),
    );

    expect(profile.languagesPercentage).toEqual({ Python: 80, JavaScript: 20 });
    expect(profile.primaryLanguages).toEqual(["Python", "JavaScript"]);
  });

  it("handles an account without repositories", () => {
    const profile = buildProfile(makeSnapshot([]));

    expect(profile.totalRepositories).toBe(0);
    expect(profile.collaborationScore).toBe(0);
    expect(profile.innovationScore).toBe(0);
    expect(profile.primaryLanguages).toEqual([]);
    expect(profile.featuredProjects).toEqual([]);
    expect(profile.experienceLevel).toBe("Junior");
    expect(profile.developerType).toBe("Software Developer");
  });

  it("computes counters and both scores", () => {
    const profile = buildProfile(
      makeSnapshot([
        makeRecord("a", {
          stars: 1,
          forks: 1,
          language: "TypeScript",
          languages: { TypeScript: 100 },
          features: { hasReadme: true, hasLicense: true, hasDockerfile: true, hasCi: true, hasTests: true },
        }),
        makeRecord("b", {
          forks: 1,
          isFork: true,
          language: "Go",
          languages: { Go: 300 },
          features: { hasReadme: true, hasLicense: false, hasDockerfile: false, hasCi: false, hasTests: true },
        }),
        makeRecord("c", { isPrivate: true }),
        makeRecord("d"),
      ]),
    );

    expect(profile.totalRepositories).toBe(4);
    expect(profile.publicRepositories).toBe(3);
    expect(profile.privateRepositories).toBe(1);
    expect(profile.originalRepositories).toBe(3);
    expect(profile.forkedRepositories).toBe(1);
    expect(profile.repositoriesWithReadme).toBe(2);
    expect(profile.repositoriesWithTests).toBe(2);
    expect(profile.repositoriesWithCi).toBe(1);
    expect(profile.repositoriesWithDocker).toBe(1);
    expect(profile.primaryLanguages).toEqual(["Go", "TypeScript"]);
    // 2/4*40 + 3/4*30 + 2/4*30
    expect(profile.collaborationScore).toBeCloseTo(57.5, 6);
    // 1/3*50 + 2*5 + 3/4*45
    expect(profile.innovationScore).toBeCloseTo(60.416667, 5);
    expect(profile.hasWebProjects).toBe(true);
    expect(profile.developerType).toBe("Frontend Developer");
  });

  it("clamps scores that overflow 100", () => {
    const profile = buildProfile(
      makeSnapshot([
        makeRecord("popular", {
          stars: 1000,
          forks: 40,
          features: { hasReadme: true, hasLicense: false, hasDockerfile: false, hasCi: false, hasTests: false },
        }),
      ]),
    );

    expect(profile.collaborationScore).toBe(100);
    expect(profile.innovationScore).toBe(100);
    expect(profile.experienceLevel).toBe("Senior");
  });

  it("never features a fork, however starred", () => {
    const profile = buildProfile(
      makeSnapshot([
        makeRecord("borrowed", { stars: 500, isFork: true }),
        makeRecord("mine", { stars: 10 }),
      ]),
    );

    expect(profile.featuredProjects.map((p) => p.name)).toEqual(["mine"]);
  });

  it("features at most six originals, most starred first", () => {
    const repos = Array.from({ length: 8 }, (_, i) => makeRecord(`repo${i}`, { stars: i }));

    const featured = buildProfile(makeSnapshot(repos)).featuredProjects;

    expect(featured.map((p) => p.name)).toEqual([
      "repo7",
      "repo6",
      "repo5",
      "repo4",
      "repo3",
      "repo2",
    ]);
  });

  it("tags featured projects by their topics", () => {
    const featured = buildProfile(
      makeSnapshot([
        makeRecord("site", { stars: 3, topics: ["Website", "API"] }),
        makeRecord("svc", { stars: 2, topics: ["rest", "library"] }),
        makeRecord("misc", { stars: 1 }),
      ]),
    ).featuredProjects;

    expect(featured.map((p) => [p.name, p.projectType])).toEqual([
      ["site", "web-app"],
      ["svc", "api"],
      ["misc", "other"],
    ]);
  });

  it("classifies full-stack when web and mobile work both appear", () => {
    const profile = buildProfile(
      makeSnapshot([
        makeRecord("app", { language: "TypeScript" }),
        makeRecord("phone", { topics: ["android"] }),
      ]),
    );

    expect(profile.hasMobileProjects).toBe(true);
    expect(profile.developerType).toBe("Full-stack Developer");
  });

  it("classifies backend from an api topic or a backend primary language", () => {
    const byTopic = buildProfile(makeSnapshot([makeRecord("svc", { topics: ["graphql"] })]));
    const byLanguage = buildProfile(
      makeSnapshot([makeRecord("etl", { language: "Python", languages: { Python: 500 } })]),
    );

    expect(byTopic.developerType).toBe("Backend Developer");
    expect(byLanguage.developerType).toBe("Backend Developer");
  });
});

describe("rebuildProfile", () => {
  it("returns a new snapshot and leaves the input untouched", () => {
    const snapshot = makeSnapshot([makeRecord("a", { stars: 2 })]);

    const rebuilt = rebuildProfile(snapshot);

    expect(snapshot.profile).toBeNull();
    expect(rebuilt.profile?.totalStars).toBe(2);
    expect(rebuilt.repositories).toBe(snapshot.repositories);
  });
});
