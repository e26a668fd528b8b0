export class UnknownAchievementError extends Error {
  constructor(public readonly achievementId: string) {
    super(`No achievement definition registered for ${achievementId}`);
    this.name = 'UnknownAchievementError';
  }
}

export class AchievementCatalogError extends Error {
  constructor(
    message: string,
    public readonly issues?: unknown
  ) {
    super(message);
    this.name = 'AchievementCatalogError';
  }
}

export class InvalidProgressValueError extends Error {
  constructor(
    public readonly achievementId: string,
    public readonly value: unknown,
    public readonly issues?: unknown
  ) {
    super(`Progress for ${achievementId} must be a non-negative integer, got ${String(value)}`);
    this.name = 'InvalidProgressValueError';
  }
}
