import { SOURCE_TAGS, type DealRating, type Lot } from "../types/lot.js";

export type ScoreWeights = {
  discount: number;
  scarcity: number;
  noBid: number;
};

export const DEFAULT_SCORE_WEIGHTS: ScoreWeights = {
  discount: 0.5,
  scarcity: 0.3,
  noBid: 0.2,
};

export type ScoringOptions = {
  weights: ScoreWeights;
  /** Rendered bid state younger than this counts as fresh */
  freshnessMs: number;
};

export function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/**
 * Negative or non-finite weights count as 0; the rest are scaled to sum to 1.
 * Falls back to the defaults when nothing is left.
 */
export function normalizeWeights(w: Partial<ScoreWeights>): ScoreWeights {
  const pick = (n: number | undefined) => (n !== undefined && Number.isFinite(n) && n > 0 ? n : 0);
  const discount = pick(w.discount);
  const scarcity = pick(w.scarcity);
  const noBid = pick(w.noBid);
  const total = discount + scarcity + noBid;
  if (total <= 0) return { ...DEFAULT_SCORE_WEIGHTS };
  return { discount: discount / total, scarcity: scarcity / total, noBid: noBid / total };
}

export function discountSignal(lot: Lot): number {
  if (!lot.retailPrice || lot.retailPrice <= 0) return 0;
  return clamp01((lot.retailPrice - lot.currentBid) / lot.retailPrice);
}

export function scarcitySignal(lot: Lot): number {
  return clamp01(1 / (1 + Math.max(0, lot.uniqueBidders)));
}

export function noBidSignal(lot: Lot): number {
  return lot.currentBid === 0 && lot.bidCount === 0 ? 1 : 0;
}

/** Opportunity score in [0, 1]; closed lots score 0 */
export function scoreLot(lot: Lot, weights: ScoreWeights = DEFAULT_SCORE_WEIGHTS): number {
  if (!lot.isOpen) return 0;
  const score =
    weights.discount * discountSignal(lot) + weights.scarcity * scarcitySignal(lot) + weights.noBid * noBidSignal(lot);
  return clamp01(score);
}

/** Discount off retail as a percentage, two decimals */
export function discountPercent(lot: Lot): number {
  return Math.round(discountSignal(lot) * 10000) / 100;
}

export function rateDeal(percent: number): DealRating {
  if (percent >= 90) return "EXCEPTIONAL";
  if (percent >= 70) return "EXCELLENT";
  if (percent >= 50) return "VERY_GOOD";
  return "GOOD";
}

/**
 * Data quality 0-100: up to 60 for corroboration across channels and up to
 * 40 for how fresh the bid state is.
 */
export function qualityScore(lot: Lot, now: number, freshnessMs: number): number {
  const seenBy = SOURCE_TAGS.filter((tag) => lot.sourceFlags[tag] !== undefined).length;
  const corroboration = (60 * seenBy) / SOURCE_TAGS.length;

  let freshness = 0;
  if (lot.bidSeenAt !== null) {
    const age = Math.max(0, now - lot.bidSeenAt);
    if (lot.bidSource === "rendered") {
      if (age <= freshnessMs) freshness = 40;
      else if (age <= 4 * freshnessMs) freshness = 20;
    } else if (age <= freshnessMs) {
      freshness = 20;
    }
  }

  return Math.round(corroboration + freshness);
}

export function applyScores(lot: Lot, now: number, opts: ScoringOptions): Lot {
  const pct = discountPercent(lot);
  return {
    ...lot,
    sourceFlags: { ...lot.sourceFlags },
    opportunityScore: scoreLot(lot, opts.weights),
    qualityScore: qualityScore(lot, now, opts.freshnessMs),
    discountPercent: pct,
    dealRating: rateDeal(pct),
    scoredAt: now,
  };
}

/** Score desc, then soonest closing (unknown last), then id */
export function compareByOpportunity(a: Lot, b: Lot): number {
  if (a.opportunityScore !== b.opportunityScore) return b.opportunityScore - a.opportunityScore;
  if (a.closesAt !== b.closesAt) {
    if (a.closesAt === null) return 1;
    if (b.closesAt === null) return -1;
    return a.closesAt - b.closesAt;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
