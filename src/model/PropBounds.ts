export type BoundsReference = 'step' | 'time';

export const REFERENCE_COLUMNS: Record<BoundsReference, string> = {
  step: 'Step',
  time: 'Time',
};

/**
 * Inclusive window over a reference column. A missing side is unbounded.
 */
export interface PropBounds {
  reference: BoundsReference;
  start?: number;
  end?: number;
}
