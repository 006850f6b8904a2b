import { describe, expect, it } from 'vitest';

import { SceneStateError } from '../../src/core/errors.js';
import { StoryState } from '../../src/scene/story.js';

const fixedClock = () => new Date('2025-01-02T03:04:05.000Z');

function storyWithBeat(): StoryState {
  const story = new StoryState('The Long Winter', fixedClock);
  story.createScene('First Frost', 'The well has frozen', 'No water by nightfall');
  story.createBeat({
    situation: 'Who broke the pump?',
    location: 'Village square',
    time: 'Dawn',
    participants: ['Alice', 'Bob']
  });
  return story;
}

describe('StoryState: timeline', () => {
  it('refuses a beat before any scene exists', () => {
    const story = new StoryState();
    expect(() => story.createBeat({ situation: 's', location: 'l', time: 't', participants: ['A'] }))
      .toThrow(SceneStateError);
  });

  it('numbers scenes and beats and fills beat defaults', () => {
    const story = storyWithBeat();
    expect(story.currentScene()).toEqual({
      number: 1,
      title: 'First Frost',
      premise: 'The well has frozen',
      stakes: 'No water by nightfall',
      startedAt: '2025-01-02T03:04:05.000Z'
    });
    expect(story.currentBeat()).toEqual({
      number: 1,
      sceneNumber: 1,
      situation: 'Who broke the pump?',
      location: 'Village square',
      time: 'Dawn',
      participants: ['Alice', 'Bob'],
      witnesses: [],
      complications: {}
    });
  });

  it('beat numbers continue across scenes', () => {
    const story = storyWithBeat();
    story.createScene('Thaw', 'Ice breaks', 'Flooding');
    const beat = story.createBeat({ situation: 'Sandbags', location: 'River', time: 'Noon', participants: ['Bob'] });
    expect(beat.number).toBe(2);
    expect(beat.sceneNumber).toBe(2);
    expect(story.beatsInScene(1).map(b => b.number)).toEqual([1]);
  });

  it('only advances time by whole positive days', () => {
    const story = new StoryState();
    expect(story.advanceTime(2.7)).toBe(2);
    expect(story.advanceTime(-1)).toBe(2);
    expect(story.advanceTime(Number.POSITIVE_INFINITY)).toBe(2);
    expect(story.totalDays).toBe(2);
  });
});

describe('StoryState: resources', () => {
  it('applies signed whole changes and never goes below zero', () => {
    const story = new StoryState();
    expect(story.updateResources({ food: -15, wood: 2.9, morale: -5 })).toEqual({
      food: 0,
      wood: 12,
      medicine: 5,
      morale: 45
    });
  });
});

describe('StoryState: reporting', () => {
  it('exports the story as an outline', () => {
    const story = storyWithBeat();
    story.completeBeat('Bob confessed');
    story.completeScene('The pump was fixed');
    story.advanceTime(3);

    expect(story.exportLog()).toBe([
      '# The Long Winter',
      'Duration: 3 days',
      '',
      '## Scene 1: First Frost',
      'Premise: The well has frozen',
      'Stakes: No water by nightfall',
      'Resolution: The pump was fixed',
      '',
      '### Beat 1: Who broke the pump?',
      'Location: Village square, Time: Dawn',
      'Characters: Alice, Bob',
      'Outcome: Bob confessed',
      ''
    ].join('\n'));
  });

  it('summarizes progress', () => {
    const story = storyWithBeat();
    story.completeScene('done');
    expect(story.summary()).toEqual({
      title: 'The Long Winter',
      currentScene: 1,
      currentBeat: 1,
      totalDays: 0,
      scenesCompleted: 1,
      totalScenes: 1,
      totalBeats: 1,
      resources: { food: 10, wood: 10, medicine: 5, morale: 50 }
    });
  });

  it('round-trips through its record', () => {
    const story = storyWithBeat();
    story.updateResources({ medicine: -2 });
    const restored = StoryState.fromRecord(story.toRecord(), fixedClock);
    expect(restored.toRecord()).toEqual(story.toRecord());
    expect(restored.currentBeat()?.situation).toBe('Who broke the pump?');
  });
});
