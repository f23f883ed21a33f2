import type { PlateRegistration } from '../core/types.js';

export type RegisterOutcome = 'registered' | 'already_registered' | 'limit_reached';

export interface PlateDirectory {
  /** Distinct owners of a fingerprint; empty when nobody registered it. */
  resolveOwners(plateFingerprint: string): Promise<string[]>;
  registerPlate(userId: string, plateFingerprint: string, maxPlates: number): Promise<RegisterOutcome>;
  unregisterPlate(userId: string, plateFingerprint: string): Promise<boolean>;
  listPlates(userId: string): Promise<PlateRegistration[]>;
}
