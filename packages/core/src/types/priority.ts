export const Priority = {
  Min: 1,
  Default: 3,
  Max: 5,
} as const;

/** Integer priority in the closed range [1, 5] */
export type Priority = 1 | 2 | 3 | 4 | 5;

export function isPriority(value: number): value is Priority {
  return Number.isInteger(value) && value >= Priority.Min && value <= Priority.Max;
}
