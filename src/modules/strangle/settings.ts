export type StrangleSettings = {
  /** Relative band around the target price, measured against each quote's own price. */
  matchTolerance: number;
  similarityTolerance: number;
  stopLossFraction: number;
  lots: number;
  windowStrikes: number;
};

export function defaultStrangleSettings(): StrangleSettings {
  return {
    matchTolerance: 0.1,
    similarityTolerance: 0.05,
    stopLossFraction: 0.2,
    lots: 1,
    windowStrikes: 10,
  };
}

export function resolveStrangleSettings(partial: Partial<StrangleSettings> = {}): StrangleSettings {
  return { ...defaultStrangleSettings(), ...partial };
}
