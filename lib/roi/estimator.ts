export interface RoiRange {
  min: number;
  max: number;
  defaultValue: number;
}

export const ROI_LIMITS = {
  managers: { min: 1, max: 500, defaultValue: 10 },
  hoursSavedPerManager: { min: 1, max: 20, defaultValue: 4 },
  hourlyCost: { min: 20, max: 300, defaultValue: 70 },
} as const satisfies Record<string, RoiRange>;

export type RoiInput = {
  managers: number;
  hoursSavedPerManager: number;
  hourlyCost: number;
};

export type RoiEstimate = {
  weeklyHours: number;
  weeklySavings: number;
};

export function clampToRange(value: number, range: RoiRange): number {
  if (!Number.isFinite(value)) {
    return range.defaultValue;
  }
  return Math.min(range.max, Math.max(range.min, Math.round(value)));
}

export function normalizeRoiInput(input: RoiInput): RoiInput {
  return {
    managers: clampToRange(input.managers, ROI_LIMITS.managers),
    hoursSavedPerManager: clampToRange(input.hoursSavedPerManager, ROI_LIMITS.hoursSavedPerManager),
    hourlyCost: clampToRange(input.hourlyCost, ROI_LIMITS.hourlyCost),
  };
}

export function estimateRoi(input: RoiInput): RoiEstimate {
  const { managers, hoursSavedPerManager, hourlyCost } = normalizeRoiInput(input);
  const weeklyHours = managers * hoursSavedPerManager;

  return {
    weeklyHours,
    weeklySavings: weeklyHours * hourlyCost,
  };
}
