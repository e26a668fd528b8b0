export const P = {
  experience: {
    base: 50,
    victory: 25,
    comeback: 20,
    comebackDeficit: 4,
    rallyIncrement: 5,
    rallyMinStreak: 3,
    rallyCap: 40,
    dominant: 20,
    dominantMargin: 5,
    endurance: 10,
    enduranceSeconds: 900,
  },
  levels: {
    baseCost: 100,
    growth: 1.5,
  },
  momentum: {
    dominantRunGap: 2,
    backAndForthLeadChanges: 5,
  },
  highlights: {
    minRun: 3,
    minDeficit: 3,
  },
} as const;
