export interface PointTiers {
  /** Pool sizes strictly above this earn `abundant` points */
  readonly highThreshold: number;
  /** Pool sizes at or below this earn `scarce` points */
  readonly lowThreshold: number;
  readonly abundant: number;
  readonly moderate: number;
  readonly scarce: number;
}

export interface Payouts {
  readonly top: number;
  readonly middle: number;
  readonly bottom: number;
}

export interface GameConfig {
  readonly pointTiers: PointTiers;
  readonly payouts: Payouts;
}

export interface GameConfigOverrides {
  readonly pointTiers?: Partial<PointTiers>;
  readonly payouts?: Partial<Payouts>;
}

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  const pointTiers = overrides.pointTiers ?? {};
  const payouts = overrides.payouts ?? {};

  return {
    pointTiers: {
      highThreshold: pointTiers.highThreshold ?? 20,
      lowThreshold: pointTiers.lowThreshold ?? 10,
      abundant: pointTiers.abundant ?? 1,
      moderate: pointTiers.moderate ?? 2,
      scarce: pointTiers.scarce ?? 3,
    },
    payouts: {
      top: payouts.top ?? 3,
      middle: payouts.middle ?? 2,
      bottom: payouts.bottom ?? 1,
    },
  };
}
