/** Random draws the drive simulation makes. */
export interface DriveRng {
  /** Float in [min, max). */
  between(min: number, max: number): number;
  /** Integer in [min, max]. */
  wholeBetween(min: number, max: number): number;
  chance(probability: number): boolean;
}

/** mulberry32; one seed always replays the same drive. */
export function seededRng(seed: number): DriveRng {
  let state = seed >>> 0;

  const unit = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  };

  return {
    between: (min, max) => min + unit() * (max - min),
    wholeBetween: (min, max) => min + Math.floor(unit() * (max - min + 1)),
    chance: (probability) => unit() < probability,
  };
}
