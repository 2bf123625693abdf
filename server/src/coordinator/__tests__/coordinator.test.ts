import { describe, expect, it } from 'vitest';
import {
  Coordinator,
  GOODBYE_TEXT,
  IDLE_TEXT,
  NO_FRAME_TEXT,
  NOTHING_NOTICED_TEXT,
  WELCOME_TEXT,
  type CoordinatorOptions
} from '../coordinator.js';
import { HELP_TEXT } from '../commands.js';
import type { Fact } from '../../facts/facts.js';
import { GestureClassifier } from '../../gestures/classifier.js';
import { IdentityGallery } from '../../identity/gallery.js';
import { IdentityResolver } from '../../identity/resolver.js';
import { ObjectTriage } from '../../objects/triage.js';
import { MockPerception, poseHand, type MockScene } from '../../perception/mock.perception.js';
import type { ObjectObservation, PerceptionAdapters } from '../../perception/perception.types.js';
import { TextReader } from '../../text/text_reader.js';
import {
  FakeClock,
  ScriptedVoice,
  settle,
  silentLogger,
  StaticFrameSource,
  StaticGallerySource
} from '../../testing/fakes.js';

const ASHA = [0.1, 0.2, 0.3, 0.4];
const PERSON: ObjectObservation = { label: 'person', confidence: 0.9, region: { x: 0, y: 160, width: 180, height: 300 } };
const CUP: ObjectObservation = { label: 'cup', confidence: 0.7, region: { x: 420, y: 300, width: 60, height: 80 } };
const STRANGER = [1, 1, 1, 1];
const OPEN_PALM = poseHand({ thumb: true, index: true, middle: true, ring: true, pinky: true });
const PEACE = poseHand({ thumb: false, index: true, middle: true, ring: false, pinky: false });
const HAZARD_NARRATION = 'Important: person on the left middle, nearby. Also seen: cup on the right bottom, further away.';

type Setup = {
  scene?: MockScene;
  perception?: PerceptionAdapters;
  frames?: StaticFrameSource;
  script?: string[];
  polls?: string[];
  options?: Partial<CoordinatorOptions>;
};

async function setup(params: Setup = {}) {
  const clock = new FakeClock();
  const logger = silentLogger();
  const gallery = new IdentityGallery(
    new StaticGallerySource([{ name: 'Asha', relation: 'sister', embeddings: [ASHA] }]),
    logger
  );
  await gallery.load();

  const identity = new IdentityResolver(gallery);
  const perception = params.perception ?? new MockPerception([params.scene ?? {}]).adapters();
  const frames = params.frames ?? new StaticFrameSource();
  const voice = new ScriptedVoice(clock, params.script, params.polls);
  const coordinator = new Coordinator({
    frames,
    voice,
    perception,
    identity,
    gestures: new GestureClassifier(),
    objects: new ObjectTriage(),
    text: new TextReader(perception.text),
    logger,
    clock,
    options: params.options
  });

  const shutdowns: string[] = [];
  coordinator.on('shutdown', (reason: string) => shutdowns.push(reason));
  return { coordinator, voice, frames, shutdowns, clock, identity };
}

describe('Coordinator session', () => {
  it('says goodbye and cleans up once on exit', async () => {
    const { coordinator, voice, frames, shutdowns } = await setup({ script: ['exit'] });

    expect(await coordinator.run()).toBe('exit');
    expect(voice.spoken).toEqual([WELCOME_TEXT, GOODBYE_TEXT]);
    expect(shutdowns).toEqual(['exit']);
    expect(frames.startCount).toBe(1);
    expect(frames.stopCount).toBe(1);
  });

  it('goes to sleep after the idle timeout and terminates only once', async () => {
    const { coordinator, voice, frames, shutdowns } = await setup({ options: { idleTimeoutMs: 1000 } });

    expect(await coordinator.run()).toBe('idle');
    expect(voice.spoken).toEqual([WELCOME_TEXT, IDLE_TEXT]);

    await coordinator.shutdown('exit');
    expect(shutdowns).toEqual(['idle']);
    expect(frames.stopCount).toBe(1);
    expect(coordinator.status().shutdownReason).toBe('idle');
    expect(coordinator.status().running).toBe(false);
  });

  it('goes to sleep as soon as the idle timeout is reached', async () => {
    const { coordinator, voice, clock, shutdowns } = await setup({
      options: { idleTimeoutMs: 1000, monitorIntervalMs: 1000 }
    });
    const stoppedAt: number[] = [];
    coordinator.on('shutdown', () => stoppedAt.push(clock.now()));

    await coordinator.start();
    await settle(20);

    expect(stoppedAt).toEqual([1000]);
    expect(shutdowns).toEqual(['idle']);
    expect(voice.spoken).toEqual([IDLE_TEXT]);
  });

  it('fails to start when the camera is unavailable', async () => {
    const { coordinator, shutdowns } = await setup({ frames: new StaticFrameSource({ failStart: true }) });
    await expect(coordinator.run()).rejects.toThrow('camera unavailable');
    expect(shutdowns).toEqual([]);
  });
});

describe('Coordinator.dispatch', () => {
  it('names a known face', async () => {
    const { coordinator, voice } = await setup({ scene: { faces: [{ embedding: ASHA }] } });
    expect(await coordinator.dispatch('who is that')).toBe(false);
    expect(voice.spoken).toEqual(['I see your sister Asha']);
  });

  it('narrates objects by priority and tracks them', async () => {
    const { coordinator, voice } = await setup({ scene: { objects: [PERSON, CUP] } });
    await coordinator.dispatch('what do you see');
    expect(voice.spoken).toEqual([HAZARD_NARRATION]);
    expect(coordinator.status().trackedObjects).toEqual(['person', 'cup']);
  });

  it('reads a sign', async () => {
    const { coordinator, voice } = await setup({ scene: { text: { text: 'EXIT', confidence: 0.88 } } });
    await coordinator.dispatch('read the sign');
    expect(voice.spoken).toEqual(['Sign reads: EXIT']);
  });

  it('scans text for a while and speaks each reading once', async () => {
    const perception = new MockPerception([
      { text: { text: 'EXIT', confidence: 0.88 } },
      { text: null },
      { text: { text: 'EXIT', confidence: 0.91 } },
      { text: { text: 'PUSH', confidence: 0.9 } }
    ]).adapters();
    const { coordinator, voice } = await setup({ perception, options: { scanDurationMs: 400 } });

    expect(await coordinator.dispatch('scan the sign')).toBe(false);
    expect(voice.spoken).toEqual(['Scanning for text.', 'Sign reads: EXIT. Sign reads: PUSH.']);
  });

  it('stops a scan early when asked', async () => {
    const { coordinator, voice } = await setup({ polls: ['stop'] });
    expect(await coordinator.dispatch('read continuously')).toBe(false);
    expect(voice.spoken).toEqual(['Scanning for text.', 'No text detected']);
  });

  it('describes the whole environment', async () => {
    const { coordinator, voice } = await setup({ scene: { faces: [{ embedding: STRANGER }], objects: [CUP] } });
    await coordinator.dispatch('describe the environment');
    expect(voice.spoken).toEqual([
      "I see someone I don't recognize. Also seen: cup on the right bottom, further away."
    ]);
  });

  it('says when there is nothing to describe', async () => {
    const { coordinator, voice } = await setup();
    await coordinator.dispatch('describe');
    expect(voice.spoken).toEqual([NOTHING_NOTICED_TEXT]);
  });

  it('lists the commands on help', async () => {
    const { coordinator, voice } = await setup();
    await coordinator.dispatch('help');
    expect(voice.spoken).toEqual([HELP_TEXT]);
  });

  it('asks to end the session on exit', async () => {
    const { coordinator, voice } = await setup();
    expect(await coordinator.dispatch('exit')).toBe(true);
    expect(voice.spoken).toEqual([GOODBYE_TEXT]);
  });

  it('ignores unmatched input', async () => {
    const { coordinator, voice } = await setup();
    expect(await coordinator.dispatch('good morning')).toBe(false);
    expect(voice.spoken).toEqual([]);
    expect(coordinator.status().metrics.commands).toBe(0);
  });

  it('apologises when a recognizer fails and keeps going', async () => {
    const mock = new MockPerception([{}]).adapters();
    const perception: PerceptionAdapters = {
      ...mock,
      faces: {
        detectFaces: async () => {
          throw new Error('camera offline');
        }
      }
    };
    const { coordinator, voice } = await setup({ perception });

    expect(await coordinator.dispatch('who is there')).toBe(false);
    expect(voice.spoken).toEqual(['Sorry, I ran into a problem: camera offline']);
    expect(coordinator.status().metrics.failedCommands).toBe(1);
  });

  it('reports a missing frame', async () => {
    const { coordinator, voice } = await setup({ frames: new StaticFrameSource({ empty: true }) });
    await coordinator.dispatch('who is there');
    expect(voice.spoken).toEqual([NO_FRAME_TEXT]);
  });
});

describe('Coordinator monitoring', () => {
  it('alerts once when a hazard comes into view', async () => {
    const { coordinator, voice } = await setup({ scene: { objects: [PERSON, CUP] } });
    const facts: Fact[] = [];
    coordinator.on('fact', (fact: Fact) => facts.push(fact));

    await coordinator.start();
    await settle(20);
    await coordinator.shutdown('signal');
    await settle(2);

    expect(voice.spoken).toEqual([HAZARD_NARRATION]);
    expect(facts).toEqual([{ modality: 'system', tier: 'high', text: HAZARD_NARRATION }]);
    expect(coordinator.status().metrics.alerts).toBe(1);
    expect(coordinator.status().metrics.cycles).toBeGreaterThan(1);
  });

  it('keeps alerting about a stranger', async () => {
    const { coordinator, voice } = await setup({ scene: { faces: [{ embedding: STRANGER }] } });

    await coordinator.start();
    await settle(20);
    await coordinator.shutdown('signal');

    expect(voice.spoken.length).toBeGreaterThan(1);
    expect(new Set(voice.spoken)).toEqual(new Set(["Someone I don't recognize."]));
  });

  it('does not spend the announcement cooldown on faces it never spoke', async () => {
    const { coordinator, voice, identity } = await setup({ scene: { faces: [{ embedding: ASHA }] } });

    await coordinator.start();
    await settle(5);
    expect(voice.spoken).toEqual([]);
    expect(identity.lastAnnouncedAt('Asha')).toBeUndefined();

    await coordinator.dispatch('who is there');
    await coordinator.shutdown('signal');
    await settle(2);

    expect(voice.spoken).toEqual(['I see your sister Asha']);
  });

  it('names a known face in an alert once per cooldown', async () => {
    const { coordinator, voice, identity } = await setup({
      scene: { faces: [{ embedding: ASHA }, { embedding: STRANGER }] }
    });

    await coordinator.start();
    await settle(20);
    await coordinator.shutdown('signal');
    await settle(2);

    expect(voice.spoken[0]).toBe("Someone I don't recognize. Your sister Asha.");
    expect(voice.spoken[1]).toBe("Someone I don't recognize.");
    expect(identity.lastAnnouncedAt('Asha')).toBe(0);
  });

  it('alerts on an urgent gesture', async () => {
    const { coordinator, voice } = await setup({ scene: { hands: [OPEN_PALM] } });

    await coordinator.start();
    await settle(20);
    await coordinator.shutdown('signal');
    await settle(2);

    expect(voice.spoken.length).toBeGreaterThan(0);
    expect(new Set(voice.spoken)).toEqual(new Set(['An open palm, possibly saying hello or stop.']));
    expect(coordinator.status().metrics.alerts).toBe(voice.spoken.length);
  });

  it('stays quiet for a gesture that is not urgent', async () => {
    const { coordinator, voice } = await setup({ scene: { hands: [PEACE] } });

    await coordinator.start();
    await settle(20);
    await coordinator.shutdown('signal');
    await settle(2);

    expect(voice.spoken).toEqual([]);
    expect(coordinator.status().metrics.alerts).toBe(0);
    expect(coordinator.status().gestureState).toBe('active');
  });

  it('skips cycles whose recognizers fail', async () => {
    const mock = new MockPerception([{}]).adapters();
    const perception: PerceptionAdapters = {
      ...mock,
      objects: {
        detectObjects: async () => {
          throw new Error('detector crashed');
        }
      }
    };
    const { coordinator, voice } = await setup({ perception });

    await coordinator.start();
    await settle(10);
    await coordinator.shutdown('signal');
    await settle(2);

    const { metrics } = coordinator.status();
    expect(metrics.skippedCycles).toBe(metrics.cycles);
    expect(voice.spoken).toEqual([]);
  });
});

describe('gesture watch', () => {
  it('stops when the user says stop', async () => {
    const { coordinator, voice } = await setup({ polls: ['stop'] });
    await coordinator.start();

    expect(await coordinator.dispatch('show me gestures')).toBe(false);
    await coordinator.shutdown('signal');
    expect(voice.spoken).toEqual(['Watching for gestures. Say stop when done.', 'Stopped watching for gestures.']);
  });

  it('ends the session when the user says exit', async () => {
    const { coordinator, voice } = await setup({ polls: ['exit'] });
    await coordinator.start();

    expect(await coordinator.dispatch('gesture')).toBe(true);
    await coordinator.shutdown('exit');
    expect(voice.spoken).toEqual(['Watching for gestures. Say stop when done.', GOODBYE_TEXT]);
  });

  it('announces gestures until the time limit', async () => {
    const { coordinator, voice } = await setup({
      scene: { hands: [PEACE] },
      options: { gestureWatchMaxMs: 500 }
    });
    await coordinator.start();

    expect(await coordinator.dispatch('watch my gestures')).toBe(false);
    await coordinator.shutdown('signal');

    expect(voice.spoken[0]).toBe('Watching for gestures. Say stop when done.');
    expect(voice.spoken).toContain('A peace sign.');
    expect(voice.spoken[voice.spoken.length - 1]).toBe('Stopped watching for gestures.');
  });
});
