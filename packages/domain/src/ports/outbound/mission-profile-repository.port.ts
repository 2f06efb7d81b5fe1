import type { MissionProfile } from '../../entities/mission-profile.js';

/** Storage for user-defined profiles. Built-ins are never persisted. */
export interface MissionProfileRepositoryPort {
  loadAll(): Promise<MissionProfile[]>;
  save(profile: MissionProfile): Promise<void>;
}
