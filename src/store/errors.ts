export class ProgressionStateError extends Error {
  constructor(
    message: string,
    public readonly context: {
      profileId?: string;
      achievementId?: string;
      value?: unknown;
    } = {}
  ) {
    super(message);
    this.name = 'ProgressionStateError';
  }
}
