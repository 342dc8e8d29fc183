/** Allowed values per dimension. A missing or empty set matches anything. */
export type ConstraintSet<D extends string> = Partial<Record<D, readonly string[]>>;

/** The attribute values a subject presents. Absent means "no value". */
export type MatchCriteria<D extends string> = Partial<Record<D, string | null>>;

export interface MatchCandidate<D extends string> {
  id: string;
  constraints: ConstraintSet<D>;
}

export interface RankedCandidate<T> {
  candidate: T;
  /** Number of dimensions the candidate declared, and therefore matched. */
  score: number;
}

export interface MatchResult<T> {
  /** Every survivor sharing the top score, in input order. */
  matches: T[];
  single: boolean;
  matchedId: string | null;
  ranked: RankedCandidate<T>[];
}

/**
 * Most-specific-wins selection over a fixed set of dimensions.
 *
 * A candidate survives when, for every dimension it constrains, the criteria
 * carry a value inside the allowed set. Survivors are ranked by how many
 * dimensions they constrain; the top tier is the result.
 */
export class CriteriaMatcher<D extends string> {
  constructor(public readonly dimensions: readonly D[]) {}

  survives(constraints: ConstraintSet<D>, criteria: MatchCriteria<D>): boolean {
    return this.scoreOf(constraints, criteria) !== null;
  }

  match<T extends MatchCandidate<D>>(
    candidates: readonly T[],
    criteria: MatchCriteria<D>,
  ): MatchResult<T> {
    const ranked: RankedCandidate<T>[] = [];
    for (const candidate of candidates) {
      const score = this.scoreOf(candidate.constraints, criteria);
      if (score !== null) ranked.push({ candidate, score });
    }

    // Array#sort is stable, so equal scores keep input order
    ranked.sort((a, b) => b.score - a.score);

    const top = ranked[0];
    if (top === undefined) {
      return { matches: [], single: false, matchedId: null, ranked };
    }

    const matches = ranked.filter((r) => r.score === top.score).map((r) => r.candidate);
    const single = matches.length === 1;
    return { matches, single, matchedId: single ? top.candidate.id : null, ranked };
  }

  private scoreOf(constraints: ConstraintSet<D>, criteria: MatchCriteria<D>): number | null {
    let score = 0;
    for (const dimension of this.dimensions) {
      const allowed = constraints[dimension];
      if (allowed === undefined || allowed.length === 0) continue;
      const value = criteria[dimension];
      if (value === undefined || value === null || !allowed.includes(value)) return null;
      score++;
    }
    return score;
  }
}
