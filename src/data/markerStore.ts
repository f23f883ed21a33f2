import type Database from 'better-sqlite3';
import type { AckMarker } from '../core/types.js';
import { openDatabase } from './openDatabase.js';

/**
 * Sender-local acknowledgment markers. `acknowledge` is a check-and-set: it returns true
 * only for the call that flipped the marker.
 */
export interface MarkerStore {
  /** No-op when a marker for the id already exists. */
  create(alertId: string, sentAt: number): Promise<void>;
  acknowledge(alertId: string, at: number): Promise<boolean>;
  get(alertId: string): Promise<AckMarker | null>;
  list(): Promise<AckMarker[]>;
  remove(alertId: string): Promise<void>;
}

export class InMemoryMarkerStore implements MarkerStore {
  private readonly markers = new Map<string, AckMarker>();

  async create(alertId: string, sentAt: number): Promise<void> {
    if (this.markers.has(alertId)) return;
    this.markers.set(alertId, { alertId, acknowledged: false, sentAt, acknowledgedAt: null });
  }

  async acknowledge(alertId: string, at: number): Promise<boolean> {
    const marker = this.markers.get(alertId);
    if (!marker || marker.acknowledged) return false;
    this.markers.set(alertId, { ...marker, acknowledged: true, acknowledgedAt: at });
    return true;
  }

  async get(alertId: string): Promise<AckMarker | null> {
    const marker = this.markers.get(alertId);
    return marker ? { ...marker } : null;
  }

  async list(): Promise<AckMarker[]> {
    return [...this.markers.values()].map((m) => ({ ...m }));
  }

  async remove(alertId: string): Promise<void> {
    this.markers.delete(alertId);
  }
}

interface MarkerRow {
  alert_id: string;
  acknowledged: number;
  sent_at: number;
  acknowledged_at: number | null;
}

const mapMarkerRow = (row: MarkerRow): AckMarker => ({
  alertId: row.alert_id,
  acknowledged: row.acknowledged === 1,
  sentAt: row.sent_at,
  acknowledgedAt: row.acknowledged_at
});

/** Markers persisted in a local SQLite file, scoped to one sender. */
export class SqliteMarkerStore implements MarkerStore {
  private readonly db: Database.Database;

  constructor(
    private readonly ownerId: string,
    dbPath = './data/markers.sqlite'
  ) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ack_markers (
        owner_id TEXT NOT NULL,
        alert_id TEXT NOT NULL,
        acknowledged INTEGER NOT NULL DEFAULT 0,
        sent_at INTEGER NOT NULL,
        acknowledged_at INTEGER,
        PRIMARY KEY (owner_id, alert_id)
      );
    `);
  }

  async create(alertId: string, sentAt: number): Promise<void> {
    this.db.prepare(
      'INSERT OR IGNORE INTO ack_markers(owner_id, alert_id, sent_at) VALUES(?, ?, ?)'
    ).run(this.ownerId, alertId, sentAt);
  }

  async acknowledge(alertId: string, at: number): Promise<boolean> {
    const info = this.db.prepare(`
      UPDATE ack_markers SET acknowledged = 1, acknowledged_at = ?
      WHERE owner_id = ? AND alert_id = ? AND acknowledged = 0
    `).run(at, this.ownerId, alertId);
    return info.changes === 1;
  }

  async get(alertId: string): Promise<AckMarker | null> {
    const row = this.db.prepare(
      'SELECT alert_id, acknowledged, sent_at, acknowledged_at FROM ack_markers WHERE owner_id = ? AND alert_id = ?'
    ).get(this.ownerId, alertId) as MarkerRow | undefined;
    return row ? mapMarkerRow(row) : null;
  }

  async list(): Promise<AckMarker[]> {
    const rows = this.db.prepare(
      'SELECT alert_id, acknowledged, sent_at, acknowledged_at FROM ack_markers WHERE owner_id = ? ORDER BY sent_at'
    ).all(this.ownerId) as MarkerRow[];
    return rows.map(mapMarkerRow);
  }

  async remove(alertId: string): Promise<void> {
    this.db.prepare('DELETE FROM ack_markers WHERE owner_id = ? AND alert_id = ?').run(this.ownerId, alertId);
  }

  close(): void {
    this.db.close();
  }
}
