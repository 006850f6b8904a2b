/**
 * Hearthside - Story State
 *
 * Scene/beat timeline, elapsed days and village resources. Survives across
 * beats and is persisted with the world snapshot.
 */

import { SceneStateError } from '../core/errors.js';
import { wholeDays } from '../core/types.js';
import {
  BeatSetupSchema,
  type BeatRecord,
  type BeatSetup,
  type Resources,
  type SceneRecord,
  type StoryRecord
} from './types.js';

export const DEFAULT_RESOURCES: Readonly<Resources> = Object.freeze({
  food: 10,
  wood: 10,
  medicine: 5,
  morale: 50
});

const RESOURCE_KEYS = ['food', 'wood', 'medicine', 'morale'] as const;

export interface StorySummary {
  title: string;
  currentScene: number;
  currentBeat: number;
  totalDays: number;
  scenesCompleted: number;
  totalScenes: number;
  totalBeats: number;
  resources: Resources;
}

export class StoryState {
  private currentSceneNumber = 0;
  private currentBeatNumber = 0;
  private days = 0;
  private readonly scenes: SceneRecord[] = [];
  private readonly beats: BeatRecord[] = [];
  private stock: Resources = { ...DEFAULT_RESOURCES };

  constructor(
    readonly title: string = 'Untitled Story',
    private readonly clock: () => Date = () => new Date()
  ) {}

  static fromRecord(record: StoryRecord, clock?: () => Date): StoryState {
    const story = new StoryState(record.title, clock);
    story.currentSceneNumber = record.currentScene;
    story.currentBeatNumber = record.currentBeat;
    story.days = record.totalDays;
    story.scenes.push(...record.scenes.map(scene => ({ ...scene })));
    story.beats.push(...record.beats.map(beat => ({
      ...beat,
      participants: [...beat.participants],
      witnesses: [...beat.witnesses],
      complications: { ...beat.complications }
    })));
    story.stock = { ...record.resources };
    return story;
  }

  // --------------------------------------------------------------------------
  // Timeline
  // --------------------------------------------------------------------------

  createScene(title: string, premise: string, stakes: string): SceneRecord {
    const scene: SceneRecord = {
      number: this.scenes.length + 1,
      title,
      premise,
      stakes,
      startedAt: this.clock().toISOString()
    };
    this.scenes.push(scene);
    this.currentSceneNumber = scene.number;
    return scene;
  }

  /**
   * Open a beat inside the current scene.
   */
  createBeat(setup: BeatSetup): BeatRecord {
    const scene = this.currentScene();
    if (!scene) {
      throw new SceneStateError('Cannot create a beat before any scene exists');
    }

    const parsed = BeatSetupSchema.parse(setup);
    const beat: BeatRecord = {
      number: this.beats.length + 1,
      sceneNumber: scene.number,
      situation: parsed.situation,
      location: parsed.location,
      time: parsed.time,
      participants: [...parsed.participants],
      witnesses: [...parsed.witnesses],
      complications: { ...parsed.complications }
    };
    this.beats.push(beat);
    this.currentBeatNumber = beat.number;
    return beat;
  }

  completeScene(resolution: string): SceneRecord | undefined {
    const scene = this.currentScene();
    if (!scene) return undefined;

    scene.resolution = resolution;
    scene.endedAt = this.clock().toISOString();
    return scene;
  }

  completeBeat(outcome: string): BeatRecord | undefined {
    const beat = this.currentBeat();
    if (!beat) return undefined;

    beat.outcome = outcome;
    return beat;
  }

  currentScene(): SceneRecord | undefined {
    return this.scenes.find(scene => scene.number === this.currentSceneNumber);
  }

  currentBeat(): BeatRecord | undefined {
    return this.beats.find(beat => beat.number === this.currentBeatNumber);
  }

  beatsInScene(sceneNumber: number): BeatRecord[] {
    return this.beats.filter(beat => beat.sceneNumber === sceneNumber);
  }

  advanceTime(days: number = 1): number {
    this.days += wholeDays(days);
    return this.days;
  }

  get totalDays(): number {
    return this.days;
  }

  // --------------------------------------------------------------------------
  // Resources
  // --------------------------------------------------------------------------

  resources(): Resources {
    return { ...this.stock };
  }

  /**
   * Apply signed changes. No resource goes below zero.
   */
  updateResources(changes: Partial<Resources>): Resources {
    const next = { ...this.stock };
    for (const key of RESOURCE_KEYS) {
      const change = changes[key];
      if (change !== undefined) next[key] = Math.max(0, next[key] + Math.trunc(change));
    }
    this.stock = next;
    return this.resources();
  }

  // --------------------------------------------------------------------------
  // Reporting
  // --------------------------------------------------------------------------

  summary(): StorySummary {
    return {
      title: this.title,
      currentScene: this.currentSceneNumber,
      currentBeat: this.currentBeatNumber,
      totalDays: this.days,
      scenesCompleted: this.scenes.filter(scene => scene.resolution !== undefined).length,
      totalScenes: this.scenes.length,
      totalBeats: this.beats.length,
      resources: this.resources()
    };
  }

  /**
   * The story so far as a readable outline.
   */
  exportLog(): string {
    const lines: string[] = [`# ${this.title}`, `Duration: ${this.days} days`, ''];

    for (const scene of this.scenes) {
      lines.push(`## Scene ${scene.number}: ${scene.title}`);
      lines.push(`Premise: ${scene.premise}`);
      lines.push(`Stakes: ${scene.stakes}`);
      if (scene.resolution !== undefined) lines.push(`Resolution: ${scene.resolution}`);
      lines.push('');

      for (const beat of this.beatsInScene(scene.number)) {
        lines.push(`### Beat ${beat.number}: ${beat.situation}`);
        lines.push(`Location: ${beat.location}, Time: ${beat.time}`);
        lines.push(`Characters: ${beat.participants.join(', ')}`);
        if (beat.outcome !== undefined) lines.push(`Outcome: ${beat.outcome}`);
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  toRecord(): StoryRecord {
    return {
      title: this.title,
      currentScene: this.currentSceneNumber,
      currentBeat: this.currentBeatNumber,
      totalDays: this.days,
      scenes: this.scenes.map(scene => ({ ...scene })),
      beats: this.beats.map(beat => ({
        ...beat,
        participants: [...beat.participants],
        witnesses: [...beat.witnesses],
        complications: { ...beat.complications }
      })),
      resources: this.resources()
    };
  }
}
