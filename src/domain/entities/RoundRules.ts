import type { PointTiers } from "../GameConfig.js";
import type { Category, Highscore, Word } from "../typedefs.js";

/** Keys under which the round is persisted in the meta store */
export const META_KEYS = {
  word: "cur_word",
  category: "cur_cat",
  points: "cur_points",
  roundEnd: "round_end",
  updateRound: "update_round",
  distributePoints: "distribute_points",
} as const;

export interface RoundSnapshot {
  readonly word: Word;
  readonly category: Category;
  readonly pointValue: number;
}

export interface RoundFlags {
  /** The last round finished and no new one has been started */
  readonly roundEnd: boolean;
  /** The word pool changed while the process was stopped */
  readonly updateRound: boolean;
  /** Round-end payout began but was not confirmed */
  readonly distributePoints: boolean;
}

/**
 * Lifecycle state computed once at startup from the persisted flags and the
 * persisted round snapshot.
 */
export type StartupState =
  | { readonly kind: "ended-pending-payout" }
  | { readonly kind: "ended" }
  | {
      readonly kind: "resuming";
      readonly snapshot: RoundSnapshot;
      readonly reprice: boolean;
    }
  | { readonly kind: "fresh" };

export interface PayoutTiers {
  readonly top: readonly Highscore[];
  readonly middle: readonly Highscore[];
  readonly bottom: readonly Highscore[];
}

const NON_NEGATIVE_INTEGER = /^\d+$/;

export function parseFlag(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === "true";
}

export function formatFlag(value: boolean): string {
  return value ? "true" : "false";
}

/**
 * Rebuild a persisted round. A snapshot with a missing key, an empty word or a
 * malformed point value does not count as saved.
 */
export function parseSnapshot(
  word: string | undefined,
  category: string | undefined,
  points: string | undefined,
): RoundSnapshot | undefined {
  if (!word || category === undefined || points === undefined) return undefined;
  if (!NON_NEGATIVE_INTEGER.test(points)) return undefined;
  return { word, category, pointValue: Number(points) };
}

export function resolveStartupState(
  flags: RoundFlags,
  snapshot: RoundSnapshot | undefined,
): StartupState {
  if (flags.roundEnd) {
    return flags.distributePoints ? { kind: "ended-pending-payout" } : { kind: "ended" };
  }

  if (snapshot) {
    return { kind: "resuming", snapshot, reprice: flags.updateRound };
  }

  return { kind: "fresh" };
}

/** Fewer remaining words make each guess worth more. */
export function pointValueFor(remaining: number, tiers: PointTiers): number {
  if (remaining > tiers.highThreshold) return tiers.abundant;
  if (remaining > tiers.lowThreshold) return tiers.moderate;
  return tiers.scarce;
}

/**
 * Split a ranking (descending by score) into payout tiers: everyone on the
 * highest score, everyone strictly above the lowest ranked score, and the rest.
 */
export function payoutTiers(ranking: readonly Highscore[]): PayoutTiers {
  const top: Highscore[] = [];
  const middle: Highscore[] = [];
  const bottom: Highscore[] = [];

  const [first] = ranking;
  const last = ranking[ranking.length - 1];
  if (!first || !last) return { top, middle, bottom };

  for (const entry of ranking) {
    if (entry.score === first.score) {
      top.push(entry);
    } else if (entry.score > last.score) {
      middle.push(entry);
    } else {
      bottom.push(entry);
    }
  }

  return { top, middle, bottom };
}

export function pickRandom<T>(items: readonly T[], random: () => number): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}
