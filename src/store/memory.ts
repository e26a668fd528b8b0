import { emptyProfile, type ProfileState, type ProgressionStore } from './types.js';

export class MemoryStore implements ProgressionStore {
  private readonly profiles = new Map<string, ProfileState>();

  async loadProfile(profileId: string): Promise<ProfileState> {
    const stored = this.profiles.get(profileId);
    return stored ? structuredClone(stored) : emptyProfile(profileId);
  }

  async saveProfile(state: ProfileState): Promise<void> {
    this.profiles.set(state.profileId, structuredClone(state));
  }

  async resetProfile(profileId: string): Promise<void> {
    this.profiles.delete(profileId);
  }
}
