import { describe, it, expect } from "vitest";
import { CriteriaMatcher, type MatchCandidate } from "../matcher.js";

type Dim = "classification" | "department" | "location";
const matcher = new CriteriaMatcher<Dim>(["classification", "department", "location"]);

const A: MatchCandidate<Dim> = { id: "A", constraints: { classification: ["c1"] } };
const B: MatchCandidate<Dim> = {
  id: "B",
  constraints: { classification: ["c1"], department: ["d1"] },
};
const C: MatchCandidate<Dim> = { id: "C", constraints: {} };

describe("CriteriaMatcher", () => {
  it("prefers the candidate that constrains the most dimensions", () => {
    const result = matcher.match([A, B, C], { classification: "c1", department: "d1" });
    expect(result.single).toBe(true);
    expect(result.matchedId).toBe("B");
    expect(result.ranked.map((r) => [r.candidate.id, r.score])).toEqual([
      ["B", 2],
      ["A", 1],
      ["C", 0],
    ]);
  });

  it("drops a candidate whose constrained dimension is absent from the criteria", () => {
    const result = matcher.match([A, B, C], { classification: "c1" });
    expect(result.ranked.map((r) => r.candidate.id)).toEqual(["A", "C"]);
    expect(result.matchedId).toBe("A");
  });

  it("treats an empty allowed set as a wildcard", () => {
    const open: MatchCandidate<Dim> = { id: "open", constraints: { classification: [] } };
    const result = matcher.match([open], { location: "l9" });
    expect(result.matchedId).toBe("open");
    expect(result.ranked[0]?.score).toBe(0);
  });

  it("returns every top-scoring candidate when they tie", () => {
    const A2: MatchCandidate<Dim> = { id: "A2", constraints: { classification: ["c1", "c2"] } };
    const result = matcher.match([A, A2, C], { classification: "c1" });
    expect(result.single).toBe(false);
    expect(result.matchedId).toBeNull();
    expect(result.matches.map((m) => m.id)).toEqual(["A", "A2"]);
  });

  it("returns an empty result when nothing survives", () => {
    const result = matcher.match([A, B], { classification: "c7" });
    expect(result).toEqual({ matches: [], single: false, matchedId: null, ranked: [] });
  });

  it("treats a null criteria value as absent", () => {
    expect(matcher.survives(A.constraints, { classification: null })).toBe(false);
    expect(matcher.survives(C.constraints, { classification: null })).toBe(true);
  });

  it("ignores dimensions the matcher was not built with", () => {
    const narrow = new CriteriaMatcher<Dim>(["classification"]);
    const result = narrow.match([A, B], { classification: "c1" });
    expect(result.matches.map((m) => m.id)).toEqual(["A", "B"]);
  });
});
