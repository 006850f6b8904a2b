/**
 * Hearthside - Database Layer
 *
 * SQLite persistence for a village story. One database file holds one
 * story. Schema designed for:
 * - Reloading the durable world (versioned JSON snapshots)
 * - Replaying beats (scenes, beats, recorded turns)
 * - Analysis (the unified scene event log)
 */

import Database from 'better-sqlite3';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { Turn } from '../conversation/types.js';
import { TurnKindSchema } from '../conversation/types.js';
import {
  EventCategorySchema,
  EventLevelSchema,
  isAtLeast,
  type EventCategory,
  type EventLevel,
  type SceneEvent
} from '../core/types.js';
import { deserializeWorld, type World, type WorldSnapshot, type WorldStore } from '../persistence/snapshot.js';
import type { BeatResult } from '../scene/orchestrator.js';
import type { BeatRecord, SceneRecord } from '../scene/types.js';

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- Durable world snapshots (roster, relationships, personalities, story)
CREATE TABLE IF NOT EXISTS world_snapshots (
  id TEXT PRIMARY KEY,
  version INTEGER NOT NULL,
  saved_at TEXT NOT NULL,
  scene_number INTEGER NOT NULL,
  beat_number INTEGER NOT NULL,
  data TEXT NOT NULL,            -- JSON WorldSnapshot
  created_at TEXT DEFAULT CURRENT_TIMESTAMP
);

-- Scenes (major story segments)
CREATE TABLE IF NOT EXISTS scenes (
  number INTEGER PRIMARY KEY,
  title TEXT NOT NULL,
  premise TEXT NOT NULL,
  stakes TEXT NOT NULL,
  resolution TEXT,
  started_at TEXT,
  ended_at TEXT
);

-- Beats (bounded conversations inside a scene)
CREATE TABLE IF NOT EXISTS beats (
  number INTEGER PRIMARY KEY,
  scene_number INTEGER NOT NULL,
  situation TEXT NOT NULL,
  location TEXT NOT NULL,
  time TEXT NOT NULL,
  participants TEXT NOT NULL,    -- JSON array
  witnesses TEXT NOT NULL,       -- JSON array
  outcome TEXT,
  end_reason TEXT,
  statistics TEXT,               -- JSON
  FOREIGN KEY (scene_number) REFERENCES scenes(number)
);

-- Recorded turns (append-only per beat)
CREATE TABLE IF NOT EXISTS turns (
  beat_number INTEGER NOT NULL,
  turn_index INTEGER NOT NULL,
  round INTEGER NOT NULL,
  speaker TEXT NOT NULL,
  kind TEXT NOT NULL,
  content TEXT,                  -- NULL for a skipped turn
  action TEXT,
  tone TEXT,
  target TEXT,
  PRIMARY KEY (beat_number, turn_index),
  FOREIGN KEY (beat_number) REFERENCES beats(number)
);

-- Unified event log
CREATE TABLE IF NOT EXISTS events (
  id TEXT PRIMARY KEY,
  scene_number INTEGER NOT NULL,
  beat_number INTEGER NOT NULL,
  round INTEGER NOT NULL,
  category TEXT NOT NULL,
  event_type TEXT NOT NULL,
  level TEXT NOT NULL,
  actor_id TEXT,
  target_id TEXT,
  payload TEXT NOT NULL,         -- JSON
  timestamp TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_world_snapshots_saved ON world_snapshots(saved_at);
CREATE INDEX IF NOT EXISTS idx_events_beat_round ON events(beat_number, round);
CREATE INDEX IF NOT EXISTS idx_events_category ON events(category);
CREATE INDEX IF NOT EXISTS idx_events_actor ON events(actor_id);
`;

// ============================================================================
// Rows
// ============================================================================

interface SnapshotRow {
  id: string;
  version: number;
  saved_at: string;
  scene_number: number;
  beat_number: number;
  data: string;
}

interface TurnRow {
  beat_number: number;
  turn_index: number;
  round: number;
  speaker: string;
  kind: string;
  content: string | null;
  action: string | null;
  tone: string | null;
  target: string | null;
}

interface EventRow {
  id: string;
  scene_number: number;
  beat_number: number;
  round: number;
  category: string;
  event_type: string;
  level: string;
  actor_id: string | null;
  target_id: string | null;
  payload: string;
  timestamp: string;
}

export interface SnapshotInfo {
  id: string;
  version: number;
  savedAt: string;
  sceneNumber: number;
  beatNumber: number;
}

export interface EventQuery {
  category?: EventCategory;
  actorId?: string;
  beatNumber?: number;
  minLevel?: EventLevel;
}

const PayloadSchema = z.record(z.unknown());

function optional(value: string | null): string | undefined {
  return value ?? undefined;
}

// ============================================================================
// Database Manager
// ============================================================================

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
}

export class HearthsideDatabase implements WorldStore {
  private db: Database.Database;

  constructor(config: DatabaseConfig) {
    this.db = new Database(config.path, {
      verbose: config.verbose ? console.log : undefined
    });

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.db.exec(SCHEMA);
  }

  // --------------------------------------------------------------------------
  // World Snapshots
  // --------------------------------------------------------------------------

  saveWorld(snapshot: WorldSnapshot): string {
    const id = uuid();
    const stmt = this.db.prepare<[string, number, string, number, number, string]>(`
      INSERT INTO world_snapshots (id, version, saved_at, scene_number, beat_number, data)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      id,
      snapshot.version,
      snapshot.savedAt,
      snapshot.story.currentScene,
      snapshot.story.currentBeat,
      JSON.stringify(snapshot)
    );
    return id;
  }

  loadWorld(id: string): World | null {
    const row = this.db
      .prepare<[string], SnapshotRow>('SELECT * FROM world_snapshots WHERE id = ?')
      .get(id);
    if (!row) return null;
    return deserializeWorld(JSON.parse(row.data));
  }

  /**
   * Most recently saved world. Ties on saved_at go to the later insert.
   */
  loadLatestWorld(): World | null {
    const row = this.db
      .prepare<[], SnapshotRow>('SELECT * FROM world_snapshots ORDER BY saved_at DESC, rowid DESC LIMIT 1')
      .get();
    if (!row) return null;
    return deserializeWorld(JSON.parse(row.data));
  }

  listSnapshots(): SnapshotInfo[] {
    const rows = this.db
      .prepare<[], SnapshotRow>('SELECT * FROM world_snapshots ORDER BY saved_at, rowid')
      .all();

    return rows.map(row => ({
      id: row.id,
      version: row.version,
      savedAt: row.saved_at,
      sceneNumber: row.scene_number,
      beatNumber: row.beat_number
    }));
  }

  // --------------------------------------------------------------------------
  // Scenes & Beats
  // --------------------------------------------------------------------------

  saveScene(scene: SceneRecord): void {
    const stmt = this.db.prepare<[number, string, string, string, string | null, string | null, string | null]>(`
      INSERT OR REPLACE INTO scenes (number, title, premise, stakes, resolution, started_at, ended_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      scene.number,
      scene.title,
      scene.premise,
      scene.stakes,
      scene.resolution ?? null,
      scene.startedAt ?? null,
      scene.endedAt ?? null
    );
  }

  saveBeat(beat: BeatRecord, result?: Pick<BeatResult, 'endReason' | 'statistics'>): void {
    const stmt = this.db.prepare<[number, number, string, string, string, string, string, string | null, string | null, string | null]>(`
      INSERT OR REPLACE INTO beats (
        number, scene_number, situation, location, time,
        participants, witnesses, outcome, end_reason, statistics
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      beat.number,
      beat.sceneNumber,
      beat.situation,
      beat.location,
      beat.time,
      JSON.stringify(beat.participants),
      JSON.stringify(beat.witnesses),
      beat.outcome ?? null,
      result?.endReason ?? null,
      result ? JSON.stringify(result.statistics) : null
    );
  }

  /**
   * Store a finished beat with its scene and every recorded turn, in one
   * transaction.
   */
  saveBeatResult(scene: SceneRecord, result: BeatResult): void {
    const insertTurn = this.db.prepare<[number, number, number, string, string, string | null, string | null, string | null, string | null]>(`
      INSERT OR REPLACE INTO turns (
        beat_number, turn_index, round, speaker, kind, content, action, tone, target
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const save = this.db.transaction(() => {
      this.saveScene(scene);
      this.saveBeat(result.beat, result);
      for (const turn of result.turns) {
        insertTurn.run(
          result.beat.number,
          turn.index,
          turn.round,
          turn.speaker,
          turn.kind,
          turn.content,
          turn.action ?? null,
          turn.tone ?? null,
          turn.target ?? null
        );
      }
    });
    save();
  }

  loadTurns(beatNumber: number): Turn[] {
    const rows = this.db
      .prepare<[number], TurnRow>('SELECT * FROM turns WHERE beat_number = ? ORDER BY turn_index')
      .all(beatNumber);

    return rows.map(row => ({
      speaker: row.speaker,
      kind: TurnKindSchema.parse(row.kind),
      round: row.round,
      index: row.turn_index,
      content: row.content,
      action: optional(row.action),
      tone: optional(row.tone),
      target: optional(row.target)
    }));
  }

  // --------------------------------------------------------------------------
  // Event Operations
  // --------------------------------------------------------------------------

  saveEvent(event: SceneEvent): void {
    const stmt = this.db.prepare<[string, number, number, number, string, string, string, string | null, string | null, string, string]>(`
      INSERT INTO events (
        id, scene_number, beat_number, round, category, event_type,
        level, actor_id, target_id, payload, timestamp
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      event.id,
      event.sceneNumber,
      event.beatNumber,
      event.round,
      event.category,
      event.eventType,
      event.level,
      event.actorId ?? null,
      event.targetId ?? null,
      JSON.stringify(event.payload),
      event.timestamp.toISOString()
    );
  }

  loadEvents(options: EventQuery = {}): SceneEvent[] {
    let sql = 'SELECT * FROM events WHERE 1=1';
    const params: (string | number)[] = [];

    if (options.category) {
      sql += ' AND category = ?';
      params.push(options.category);
    }
    if (options.actorId) {
      sql += ' AND actor_id = ?';
      params.push(options.actorId);
    }
    if (options.beatNumber !== undefined) {
      sql += ' AND beat_number = ?';
      params.push(options.beatNumber);
    }

    sql += ' ORDER BY timestamp, rowid';

    const rows = this.db.prepare<(string | number)[], EventRow>(sql).all(...params);

    const events = rows.map((row): SceneEvent => ({
      id: row.id,
      sceneNumber: row.scene_number,
      beatNumber: row.beat_number,
      round: row.round,
      category: EventCategorySchema.parse(row.category),
      eventType: row.event_type,
      level: EventLevelSchema.parse(row.level),
      actorId: optional(row.actor_id),
      targetId: optional(row.target_id),
      payload: PayloadSchema.parse(JSON.parse(row.payload)),
      timestamp: new Date(row.timestamp)
    }));

    const { minLevel } = options;
    return minLevel ? events.filter(event => isAtLeast(event.level, minLevel)) : events;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  close(): void {
    this.db.close();
  }

  raw(): Database.Database {
    return this.db;
  }
}
