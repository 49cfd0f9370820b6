export interface RandomSource {
  /** Integer in the inclusive range [min, max]. */
  nextInt(min: number, max: number): number;
}

export const mathRandomSource: RandomSource = {
  nextInt: (min, max) => min + Math.floor(Math.random() * (max - min + 1))
};
