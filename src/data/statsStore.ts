import type { UserStats } from '../core/types.js';

export type StatField = 'alertsSent' | 'responsesGiven' | 'carsFreed';

export interface StatsStore {
  bumpStat(userId: string, field: StatField): Promise<void>;
  getStats(userId: string): Promise<UserStats>;
}
