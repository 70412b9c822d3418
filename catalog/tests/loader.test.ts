/**
 * Game Catalog — Loader and Validator Tests
 */

import { describe, it, expect } from "vitest";
import {
  parseGameLine,
  splitFields,
  validateGameRow,
  createGameRecord,
  gamesEqual,
  gameKey,
  compareScores,
  calendarDate,
  type RawGameRow,
} from "../src";

function row(overrides: Partial<RawGameRow> = {}): RawGameRow {
  return {
    name: "Iron Parade",
    platform: "Xbox One",
    releaseDate: "18-Nov-2014",
    summary: "Three rivals plan one last heist.",
    metaScore: "97",
    userReview: "7.9",
    ...overrides,
  };
}

function line(overrides: Partial<RawGameRow> = {}): string {
  const r = row(overrides);
  return [r.name, r.platform, r.releaseDate, r.summary, r.metaScore, r.userReview].join(",");
}

function rulesFor(text: string): string[] {
  const outcome = parseGameLine(text);
  return outcome.kind === "invalid" ? outcome.errors.map((e) => e.rule) : [];
}

// ─── parseGameLine ───────────────────────────────────────────

describe("parseGameLine", () => {
  it("should parse a well-formed line into a record", () => {
    expect(parseGameLine(line())).toEqual({
      kind: "game",
      game: {
        name: "Iron Parade",
        platform: "Xbox One",
        releaseDate: { year: 2014, month: 11, day: 18 },
        summary: "Three rivals plan one last heist.",
        metaScore: 97,
        userReview: 7.9,
      },
    });
  });

  it("should accept signed and abbreviated numbers", () => {
    const outcome = parseGameLine(line({ metaScore: "+90", userReview: ".5" }));
    expect(outcome.kind).toBe("game");
    if (outcome.kind === "game") {
      expect(outcome.game.metaScore).toBe(90);
      expect(outcome.game.userReview).toBe(0.5);
    }
  });

  it("should accept an empty summary", () => {
    expect(parseGameLine(line({ summary: "" })).kind).toBe("game");
  });

  it("should report the field count of malformed lines", () => {
    expect(parseGameLine(line({ summary: "Fast, loud" }))).toEqual({ kind: "malformed", fieldCount: 7 });
    expect(parseGameLine("a,b,c,d,e")).toEqual({ kind: "malformed", fieldCount: 5 });
    expect(parseGameLine("")).toEqual({ kind: "malformed", fieldCount: 1 });
  });

  it("should reject a date in the wrong format", () => {
    expect(rulesFor(line({ releaseDate: "10-November-2014" }))).toEqual(["schema:pattern"]);
    expect(rulesFor(line({ releaseDate: "2014-11-10" }))).toEqual(["schema:pattern"]);
  });

  it("should resolve a day past the end of its month to the last day", () => {
    const outcome = parseGameLine(line({ releaseDate: "31-Feb-2014" }));
    expect(outcome.kind).toBe("game");
    if (outcome.kind === "game") {
      expect(outcome.game.releaseDate).toEqual({ year: 2014, month: 2, day: 28 });
    }
  });

  it("should reject a day outside 01-31", () => {
    expect(rulesFor(line({ releaseDate: "32-Jan-2014" }))).toEqual(["semantic:calendar-date"]);
    expect(rulesFor(line({ releaseDate: "00-Jan-2014" }))).toEqual(["semantic:calendar-date"]);
  });

  it("should reject an unknown month abbreviation", () => {
    expect(rulesFor(line({ releaseDate: "10-nov-2014" }))).toEqual(["semantic:calendar-date"]);
    expect(rulesFor(line({ releaseDate: "10-Noe-2014" }))).toEqual(["semantic:calendar-date"]);
  });

  it("should reject non-numeric scores", () => {
    expect(rulesFor(line({ metaScore: "ninety" }))).toEqual(["schema:pattern"]);
    expect(rulesFor(line({ metaScore: "97.5" }))).toEqual(["schema:pattern"]);
    expect(rulesFor(line({ userReview: "" }))).toEqual(["schema:pattern"]);
  });

  it("should not trim whitespace around the meta score", () => {
    expect(rulesFor(line({ metaScore: " 97" }))).toEqual(["schema:pattern"]);
  });

  it("should reject an out-of-range meta score", () => {
    expect(rulesFor(line({ metaScore: "99999999999999999999" }))).toEqual(["semantic:safe-integer"]);
  });

  it("should read user reviews like Java double literals", () => {
    const reviews = ["8.5 ", "\t8.5", "8.5f", "8.5D", "1e400", "-Infinity", "NaN"].map((text) => {
      const outcome = parseGameLine(line({ userReview: text }));
      return outcome.kind === "game" ? outcome.game.userReview : outcome.kind;
    });
    expect(reviews).toEqual([8.5, 8.5, 8.5, 8.5, Infinity, -Infinity, NaN]);
  });

  it("should still reject a user review that is not a number", () => {
    expect(rulesFor(line({ userReview: "8.5 stars" }))).toEqual(["schema:pattern"]);
    expect(rulesFor(line({ userReview: "f" }))).toEqual(["schema:pattern"]);
  });

  it("should reject an empty name or platform", () => {
    expect(rulesFor(line({ name: "" }))).toEqual(["schema:minLength"]);
    expect(rulesFor(line({ platform: "" }))).toEqual(["schema:minLength"]);
  });

  it("should produce frozen records", () => {
    const outcome = parseGameLine(line());
    expect(outcome.kind).toBe("game");
    if (outcome.kind === "game") {
      expect(Object.isFrozen(outcome.game)).toBe(true);
      expect(Object.isFrozen(outcome.game.releaseDate)).toBe(true);
    }
  });
});

describe("splitFields", () => {
  it("should split on every comma without quoting", () => {
    expect(splitFields('a,"b,c",d')).toEqual(["a", '"b', 'c"', "d"]);
  });
});

// ─── validateGameRow ─────────────────────────────────────────

describe("validateGameRow", () => {
  it("should accept a valid row", () => {
    expect(validateGameRow(row())).toEqual({ valid: true, errors: [] });
  });

  it("should report every failing field", () => {
    const result = validateGameRow(row({ name: "", releaseDate: "bad" }));
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.path).sort()).toEqual(["/name", "/releaseDate"]);
  });

  it("should not double-report a field the schema rejected", () => {
    const result = validateGameRow(row({ releaseDate: "31/02/2014" }));
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].rule).toBe("schema:pattern");
  });

  it("should accept a day past the end of its month", () => {
    expect(validateGameRow(row({ releaseDate: "30-Feb-2000" }))).toEqual({ valid: true, errors: [] });
  });

  it("should describe semantic failures", () => {
    const result = validateGameRow(row({ releaseDate: "32-Feb-2000" }));
    expect(result.errors).toEqual([
      {
        path: "/releaseDate",
        message: '"32-Feb-2000" has an unknown month or a day outside 01-31',
        rule: "semantic:calendar-date",
      },
    ]);
  });
});

// ─── Record Values ───────────────────────────────────────────

describe("compareScores", () => {
  it("orders NaN above Infinity and -0 below 0", () => {
    const sorted = [NaN, 1, -0, Infinity, 0, -Infinity].sort(compareScores);
    expect(sorted).toEqual([-Infinity, -0, 0, 1, Infinity, NaN]);
    expect(Object.is(sorted[1], -0)).toBe(true);
    expect(compareScores(NaN, NaN)).toBe(0);
  });
});

describe("Record values", () => {
  const fields = {
    name: "Skyloom",
    platform: "Dreamcast",
    releaseDate: calendarDate(1999, 9, 9),
    summary: "A courier pilot races airships.",
    metaScore: 94,
    userReview: 8.9,
  };

  it("should compare records by value", () => {
    const a = createGameRecord(fields);
    const b = createGameRecord({ ...fields, releaseDate: calendarDate(1999, 9, 9) });
    expect(a).not.toBe(b);
    expect(gamesEqual(a, b)).toBe(true);
    expect(gameKey(a)).toBe(gameKey(b));
  });

  it("should distinguish records differing in one field", () => {
    const a = createGameRecord(fields);
    const b = createGameRecord({ ...fields, releaseDate: calendarDate(1999, 9, 10) });
    const c = createGameRecord({ ...fields, userReview: 9.0 });
    expect(gamesEqual(a, b)).toBe(false);
    expect(gamesEqual(a, c)).toBe(false);
    expect(gameKey(a)).not.toBe(gameKey(b));
  });

  it("should treat NaN reviews as equal and signed zeros as distinct", () => {
    const nan = createGameRecord({ ...fields, userReview: NaN });
    const inf = createGameRecord({ ...fields, userReview: Infinity });
    expect(gamesEqual(nan, createGameRecord({ ...fields, userReview: NaN }))).toBe(true);
    expect(gameKey(nan)).not.toBe(gameKey(inf));
    const zero = createGameRecord({ ...fields, userReview: 0 });
    const negativeZero = createGameRecord({ ...fields, userReview: -0 });
    expect(gamesEqual(zero, negativeZero)).toBe(false);
    expect(gameKey(zero)).not.toBe(gameKey(negativeZero));
  });

  it("should build keys from every field", () => {
    expect(gameKey(createGameRecord(fields))).toBe(
      '["Skyloom","Dreamcast","09-Sep-1999","A courier pilot races airships.",94,"8.9"]',
    );
  });
});
