/**
 * Hearthside - Beat Tracking
 *
 * MLflow-compatible run directories for finished beats:
 *
 *   <root>/
 *     _experiments.json
 *     <experiment_id>/
 *       meta.json
 *       <run_id>/
 *         meta.json
 *         params/  metrics/  tags/  artifacts/
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { BeatResult } from '../scene/orchestrator.js';

// ============================================================================
// Tracking Types
// ============================================================================

export type RunStatus = 'RUNNING' | 'FINISHED' | 'FAILED' | 'KILLED';

export interface ExperimentConfig {
  /** Directory or file:// URI; defaults to ./mlruns */
  trackingUri?: string;
  experimentName: string;
  defaultTags?: Record<string, string>;
}

const ExperimentMapSchema = z.record(z.string());
const RunMetaSchema = z.record(z.unknown());

function fileKey(key: string): string {
  return key.replace(/\./g, '_');
}

// ============================================================================
// Local File Tracker
// ============================================================================

export class BeatTracker {
  private rootDir: string;
  private experimentId: string | null = null;
  private experimentName: string;
  private defaultTags: Record<string, string>;

  constructor(config: ExperimentConfig) {
    this.rootDir = config.trackingUri?.replace('file://', '') ?? './mlruns';
    this.experimentName = config.experimentName;
    this.defaultTags = config.defaultTags ?? {};

    if (!fs.existsSync(this.rootDir)) {
      fs.mkdirSync(this.rootDir, { recursive: true });
    }
  }

  /**
   * Resolve the experiment id by name, creating the experiment on first use.
   */
  async initialize(): Promise<string> {
    const nameMapPath = path.join(this.rootDir, '_experiments.json');
    let experiments: Record<string, string> = {};

    if (fs.existsSync(nameMapPath)) {
      experiments = ExperimentMapSchema.parse(JSON.parse(fs.readFileSync(nameMapPath, 'utf-8')));
    }

    const existing = experiments[this.experimentName];
    if (existing) {
      this.experimentId = existing;
      return existing;
    }

    const experimentId = uuid().replace(/-/g, '').slice(0, 16);
    experiments[this.experimentName] = experimentId;
    fs.writeFileSync(nameMapPath, JSON.stringify(experiments, null, 2));

    const expDir = path.join(this.rootDir, experimentId);
    fs.mkdirSync(expDir, { recursive: true });
    fs.writeFileSync(path.join(expDir, 'meta.json'), JSON.stringify({
      experiment_id: experimentId,
      name: this.experimentName,
      created_at: new Date().toISOString()
    }, null, 2));

    this.experimentId = experimentId;
    return experimentId;
  }

  async startRun(runName: string): Promise<string> {
    const experimentId = this.experimentId ?? await this.initialize();

    const runId = uuid().replace(/-/g, '');
    const runDir = path.join(this.rootDir, experimentId, runId);

    for (const sub of ['artifacts', 'metrics', 'params', 'tags']) {
      fs.mkdirSync(path.join(runDir, sub), { recursive: true });
    }

    fs.writeFileSync(path.join(runDir, 'meta.json'), JSON.stringify({
      run_id: runId,
      run_name: runName,
      experiment_id: experimentId,
      status: 'RUNNING',
      start_time: Date.now()
    }, null, 2));

    for (const [key, value] of Object.entries(this.defaultTags)) {
      await this.setTag(runId, key, value);
    }

    return runId;
  }

  async endRun(runId: string, status: RunStatus = 'FINISHED'): Promise<void> {
    const runDir = this.findRunDir(runId);
    if (!runDir) return;

    const metaPath = path.join(runDir, 'meta.json');
    const meta = RunMetaSchema.parse(JSON.parse(fs.readFileSync(metaPath, 'utf-8')));
    fs.writeFileSync(metaPath, JSON.stringify({ ...meta, status, end_time: Date.now() }, null, 2));
  }

  async logMetric(runId: string, key: string, value: number, step?: number): Promise<void> {
    const runDir = this.findRunDir(runId);
    if (!runDir) return;

    const entry = `${Date.now()} ${value} ${step ?? 0}\n`;
    fs.appendFileSync(path.join(runDir, 'metrics', fileKey(key)), entry);
  }

  async logMetrics(runId: string, metrics: Record<string, number>, step?: number): Promise<void> {
    for (const [key, value] of Object.entries(metrics)) {
      await this.logMetric(runId, key, value, step);
    }
  }

  async logParam(runId: string, key: string, value: string): Promise<void> {
    const runDir = this.findRunDir(runId);
    if (!runDir) return;
    fs.writeFileSync(path.join(runDir, 'params', fileKey(key)), value);
  }

  async setTag(runId: string, key: string, value: string): Promise<void> {
    const runDir = this.findRunDir(runId);
    if (!runDir) return;
    fs.writeFileSync(path.join(runDir, 'tags', fileKey(key)), value);
  }

  async logArtifactData(runId: string, artifactName: string, data: unknown): Promise<void> {
    const runDir = this.findRunDir(runId);
    if (!runDir) return;

    const artifactPath = path.join(runDir, 'artifacts', artifactName);
    fs.mkdirSync(path.dirname(artifactPath), { recursive: true });
    fs.writeFileSync(artifactPath, JSON.stringify(data, null, 2));
  }

  /**
   * One finished run per beat: setup as params, turn statistics as
   * metrics, transcript, reflections and asymmetries as artifacts.
   */
  async recordBeat(result: BeatResult): Promise<string> {
    const { beat, statistics } = result;
    const runId = await this.startRun(`beat-${beat.number}`);

    await this.logParam(runId, 'beat.number', String(beat.number));
    await this.logParam(runId, 'beat.scene_number', String(beat.sceneNumber));
    await this.logParam(runId, 'beat.situation', beat.situation);
    await this.logParam(runId, 'beat.location', beat.location);
    await this.logParam(runId, 'beat.participants', beat.participants.join(','));
    await this.setTag(runId, 'end_reason', result.endReason);

    await this.logMetrics(runId, {
      'beat.total_turns': statistics.totalTurns,
      'beat.skipped_turns': statistics.skippedTurns,
      'beat.interjections': statistics.interjections,
      'beat.rounds_completed': statistics.roundsCompleted,
      'relationships.asymmetries': result.asymmetries.length
    });
    for (const [agent, turns] of Object.entries(statistics.turnsByAgent)) {
      await this.logMetric(runId, `agent.${agent}.turns`, turns);
    }

    await this.logArtifactData(runId, 'turns.json', result.turns);
    await this.logArtifactData(runId, 'reflections.json', result.reflections);
    await this.logArtifactData(runId, 'asymmetries.json', result.asymmetries);

    await this.endRun(runId, 'FINISHED');
    return runId;
  }

  runDirectory(runId: string): string | null {
    return this.findRunDir(runId);
  }

  private findRunDir(runId: string): string | null {
    if (!this.experimentId) return null;
    const runDir = path.join(this.rootDir, this.experimentId, runId);
    return fs.existsSync(runDir) ? runDir : null;
  }

  getExperimentId(): string | null {
    return this.experimentId;
  }
}
