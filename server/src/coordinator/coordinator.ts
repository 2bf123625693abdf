import { EventEmitter } from 'events';
import type { Logger } from '../logger.js';
import { composeUtterance, toSentence, type Fact } from '../facts/facts.js';
import { FactQueue } from '../facts/fact_queue.js';
import type { GestureClassifier, GestureLabel } from '../gestures/classifier.js';
import { describeGesture, describeGestures, gestureFacts, URGENT_GESTURES } from '../gestures/gesture_phrases.js';
import { describeIdentities, type IdentityFact, type IdentityResolver } from '../identity/resolver.js';
import { describeObjects, objectFacts, type ObjectTriage, type TriagedObject } from '../objects/triage.js';
import type { FrameSource } from '../perception/frame_source.js';
import type { Frame, PerceptionAdapters, TextMode } from '../perception/perception.types.js';
import { NO_TEXT, type TextReader } from '../text/text_reader.js';
import type { VoiceChannel } from '../voice/voice.types.js';
import { systemClock, type Clock } from './clock.js';
import { HELP_TEXT, isStopRequest, parseCommand, tokenize, type Command } from './commands.js';

export const WELCOME_TEXT = [
  "Hello! I'm your perception assistant.",
  'I can help you identify people, describe objects, read text and recognize gestures.',
  "Say 'help' for available commands."
].join(' ');
export const IDLE_TEXT = 'No activity detected for a while. Going to sleep mode.';
export const GOODBYE_TEXT = 'Goodbye! Stay safe!';
export const NO_FRAME_TEXT = "I couldn't get a picture from the camera.";
export const NOTHING_NOTICED_TEXT = "I don't notice anything in particular right now.";

export type ShutdownReason = 'exit' | 'idle' | 'signal' | 'stopped';

export type CoordinatorOptions = {
  monitorIntervalMs: number;
  idleTimeoutMs: number;
  listenTimeoutMs: number;
  phraseLimitMs: number;
  gestureWatchMaxMs: number;
  scanDurationMs: number;
  factQueueSize: number;
};

const DEFAULT_OPTIONS: CoordinatorOptions = {
  monitorIntervalMs: 100,
  idleTimeoutMs: 300_000,
  listenTimeoutMs: 5000,
  phraseLimitMs: 5000,
  gestureWatchMaxMs: 30_000,
  scanDurationMs: 5000,
  factQueueSize: 16
};

export type CoordinatorDeps = {
  frames: FrameSource;
  voice: VoiceChannel;
  perception: PerceptionAdapters;
  identity: IdentityResolver;
  gestures: GestureClassifier;
  objects: ObjectTriage;
  text: TextReader;
  logger: Logger;
  clock?: Clock;
  options?: Partial<CoordinatorOptions>;
};

export type CoordinatorMetrics = {
  cycles: number;
  skippedCycles: number;
  alerts: number;
  commands: number;
  failedCommands: number;
  utterances: number;
};

export type CoordinatorStatus = {
  running: boolean;
  startedAt: number | null;
  lastActivityAt: number;
  watchingGestures: boolean;
  gestureState: 'idle' | 'active';
  trackedObjects: string[];
  queuedFacts: number;
  droppedFacts: number;
  metrics: CoordinatorMetrics;
  shutdownReason: ShutdownReason | null;
};

export type Observation = {
  // Assessed only; committed to the cooldown once spoken.
  identities: IdentityFact[];
  faceCount: number;
  gestures: GestureLabel[];
  objects: TriagedObject[];
  // Labels that were already being tracked before this frame.
  alreadyTracked: ReadonlySet<string>;
};

/**
 * Owns the camera and the voice. A background monitor samples frames and raises
 * alerts for hazards, strangers and urgent gestures; the foreground loop listens
 * for commands. Both share one serialized capture path and one serialized speech
 * path, and both end in the same `shutdown`.
 */
export class Coordinator extends EventEmitter {
  private readonly frames: FrameSource;
  private readonly voice: VoiceChannel;
  private readonly perception: PerceptionAdapters;
  private readonly identity: IdentityResolver;
  private readonly gestures: GestureClassifier;
  private readonly objects: ObjectTriage;
  private readonly text: TextReader;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly options: CoordinatorOptions;
  private readonly queue: FactQueue;

  private captureChain: Promise<unknown> = Promise.resolve();
  private speechChain: Promise<unknown> = Promise.resolve();
  private running = false;
  private startedAt: number | null = null;
  private lastActivityAt = 0;
  private watchingGestures = false;
  private monitorTask: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private shutdownReason: ShutdownReason | null = null;
  private readonly metrics: CoordinatorMetrics = {
    cycles: 0,
    skippedCycles: 0,
    alerts: 0,
    commands: 0,
    failedCommands: 0,
    utterances: 0
  };

  constructor(deps: CoordinatorDeps) {
    super();
    this.frames = deps.frames;
    this.voice = deps.voice;
    this.perception = deps.perception;
    this.identity = deps.identity;
    this.gestures = deps.gestures;
    this.objects = deps.objects;
    this.text = deps.text;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.options = { ...DEFAULT_OPTIONS, ...deps.options };
    this.queue = new FactQueue(this.options.factQueueSize);
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running || this.stopping) return;
    await this.frames.start();
    this.running = true;
    this.startedAt = this.clock.now();
    this.lastActivityAt = this.startedAt;
    this.monitorTask = this.monitor();
    this.logger.info({ frames: this.frames.label }, 'coordinator started');
  }

  /**
   * Foreground loop: welcome, then listen → dispatch → flush until one of the
   * termination paths calls `shutdown`. Resolves with the shutdown reason.
   */
  async run(): Promise<ShutdownReason> {
    await this.start();
    await this.say(WELCOME_TEXT);

    while (this.running) {
      const utterance = await this.voice.listen(this.options.listenTimeoutMs, this.options.phraseLimitMs);
      if (!this.running) break;
      if (utterance && utterance.trim()) {
        this.lastActivityAt = this.clock.now();
        const end = await this.dispatch(utterance);
        if (end) {
          await this.shutdown('exit');
          break;
        }
      }
      await this.flush();
    }

    await this.shutdown('stopped');
    if (this.monitorTask) await this.monitorTask;
    return this.shutdownReason ?? 'stopped';
  }

  /** Runs at most one command. Returns true when the session should end. */
  async dispatch(utterance: string): Promise<boolean> {
    const command = parseCommand(utterance);
    if (!command) {
      this.logger.debug({ utterance }, 'no command matched');
      return false;
    }

    this.metrics.commands += 1;
    this.logger.info({ command: command.kind }, 'dispatching command');
    try {
      return await this.execute(command, utterance);
    } catch (error) {
      this.metrics.failedCommands += 1;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ error, command: command.kind }, 'command failed');
      await this.say(`Sorry, I ran into a problem: ${message}`);
      return false;
    }
  }

  capture(): Promise<Frame | null> {
    const next = this.captureChain.then(() => this.frames.capture());
    this.captureChain = next.catch(() => undefined);
    return next;
  }

  say(text: string): Promise<void> {
    const sentence = text.trim();
    if (!sentence) return Promise.resolve();
    const next = this.speechChain.then(async () => {
      this.metrics.utterances += 1;
      this.emit('speech', sentence);
      await this.voice.speak(sentence);
    });
    this.speechChain = next.catch((error: unknown) => {
      this.logger.warn({ error }, 'speech failed');
    });
    return next;
  }

  enqueue(fact: Fact): void {
    this.queue.push(fact);
    this.emit('fact', fact);
  }

  async flush(): Promise<void> {
    const facts = this.queue.drain();
    if (facts.length === 0) return;
    await this.say(composeUtterance(facts));
  }

  /** True for a newly seen hazard, any stranger, or an urgent gesture. */
  checkImportantChanges(observation: Observation): boolean {
    return (
      observation.objects.some((object) => object.tier === 'high' && !observation.alreadyTracked.has(object.label)) ||
      observation.identities.some((fact) => fact.name === null) ||
      observation.gestures.some((label) => URGENT_GESTURES.has(label))
    );
  }

  async shutdown(reason: ShutdownReason): Promise<void> {
    if (this.stopping) return this.stopping;
    this.running = false;
    this.shutdownReason = reason;
    this.stopping = this.cleanup(reason);
    return this.stopping;
  }

  status(): CoordinatorStatus {
    const now = this.clock.now();
    return {
      running: this.running,
      startedAt: this.startedAt,
      lastActivityAt: this.lastActivityAt,
      watchingGestures: this.watchingGestures,
      gestureState: this.gestures.state,
      trackedObjects: this.objects.tracked(now).map((entry) => entry.label),
      queuedFacts: this.queue.size,
      droppedFacts: this.queue.dropped,
      metrics: { ...this.metrics },
      shutdownReason: this.shutdownReason
    };
  }

  private async cleanup(reason: ShutdownReason): Promise<void> {
    try {
      await this.flush();
    } catch (error) {
      this.logger.warn({ error }, 'final flush failed');
    }
    try {
      await this.frames.stop();
    } catch (error) {
      this.logger.warn({ error }, 'frame source stop failed');
    }
    this.logger.info({ reason, metrics: this.metrics }, 'coordinator stopped');
    this.emit('shutdown', reason);
  }

  private async monitor(): Promise<void> {
    try {
      while (this.running) {
        await this.monitorOnce();
        if (!this.running) break;
        await this.clock.sleep(this.options.monitorIntervalMs);
      }
    } catch (error) {
      this.logger.error({ error }, 'monitor stopped unexpectedly');
    }
  }

  private async monitorOnce(): Promise<void> {
    const now = this.clock.now();
    if (now - this.lastActivityAt >= this.options.idleTimeoutMs) {
      await this.say(IDLE_TEXT);
      await this.shutdown('idle');
      return;
    }

    this.metrics.cycles += 1;
    let observation: Observation;
    try {
      const frame = await this.capture();
      if (!frame) {
        this.metrics.skippedCycles += 1;
        return;
      }
      observation = await this.observe(frame, now, !this.watchingGestures);
    } catch (error) {
      this.metrics.skippedCycles += 1;
      this.logger.warn({ error }, 'monitor cycle skipped');
      return;
    }

    if (!this.running || !this.checkImportantChanges(observation)) return;

    const facts = [...observation.identities, ...objectFacts(observation.objects), ...gestureFacts(observation.gestures)];
    this.metrics.alerts += 1;
    this.enqueue({ modality: 'system', tier: 'high', text: composeUtterance(facts) });
    this.identity.commit(observation.identities, now);
    await this.flush();
  }

  private async observe(frame: Frame, now: number, classifyHands: boolean): Promise<Observation> {
    const [faces, hands, detections] = await Promise.all([
      this.perception.faces.detectFaces(frame),
      classifyHands ? this.perception.hands.detectHands(frame) : Promise.resolve([]),
      this.perception.objects.detectObjects(frame)
    ]);
    const alreadyTracked = new Set(this.objects.tracked(now).map((entry) => entry.label));
    return {
      alreadyTracked,
      identities: this.identity.assess(faces, now).facts,
      faceCount: faces.length,
      gestures: classifyHands ? this.gestures.update(hands, now) : [],
      objects: this.objects.process(detections, frame, now)
    };
  }

  private async execute(command: Command, utterance: string): Promise<boolean> {
    switch (command.kind) {
      case 'identify': {
        const frame = await this.capture();
        if (!frame) return this.sayNoFrame();
        const faces = await this.perception.faces.detectFaces(frame);
        await this.say(describeIdentities(this.identity.resolve(faces, this.clock.now())));
        return false;
      }
      case 'objects': {
        const frame = await this.capture();
        if (!frame) return this.sayNoFrame();
        const detections = await this.perception.objects.detectObjects(frame);
        await this.say(describeObjects(this.objects.process(detections, frame, this.clock.now())));
        return false;
      }
      case 'read': {
        const frame = await this.capture();
        if (!frame) return this.sayNoFrame();
        await this.say(await this.text.read(frame, command.mode, this.clock.now()));
        return false;
      }
      case 'scan':
        return this.scanText(command.mode);
      case 'gestures':
        return this.watchGestures();
      case 'describe': {
        const frame = await this.capture();
        if (!frame) return this.sayNoFrame();
        const now = this.clock.now();
        const observation = await this.observe(frame, now, true);
        await this.say(this.describeEnvironment(observation));
        this.identity.commit(observation.identities, now);
        return false;
      }
      case 'help':
        await this.say(HELP_TEXT);
        return false;
      case 'exit':
        this.logger.info({ utterance }, 'exit requested');
        await this.say(GOODBYE_TEXT);
        return true;
    }
  }

  private describeEnvironment(observation: Observation): string {
    const parts: string[] = [];
    if (observation.faceCount > 0) {
      parts.push(describeIdentities({ facts: observation.identities, suppressed: [] }));
    }
    if (observation.objects.length > 0) {
      parts.push(describeObjects(observation.objects));
    }
    if (observation.gestures.length > 0) {
      parts.push(describeGestures(observation.gestures));
    }
    if (parts.length === 0) return NOTHING_NOTICED_TEXT;
    return parts.map(toSentence).join(' ');
  }

  /**
   * Speaks gestures as they appear until the user says stop, the classifier
   * reports that gesturing ended, or the watch runs past its limit. Returns true
   * when the user asked to exit while watching.
   */
  private async watchGestures(): Promise<boolean> {
    await this.say('Watching for gestures. Say stop when done.');
    this.watchingGestures = true;
    const startedAt = this.clock.now();
    try {
      while (this.running) {
        const request = this.pollStopRequest();
        if (request === 'exit') {
          await this.say(GOODBYE_TEXT);
          return true;
        }
        if (request === 'stop') {
          await this.say('Stopped watching for gestures.');
          return false;
        }
        if (this.clock.now() - startedAt >= this.options.gestureWatchMaxMs) {
          await this.say('Stopped watching for gestures.');
          return false;
        }

        const frame = await this.capture();
        if (frame) {
          const labels = this.gestures.update(await this.perception.hands.detectHands(frame), this.clock.now());
          if (labels.includes('gesture_stop')) {
            await this.say(toSentence(describeGesture('gesture_stop')));
            return false;
          }
          if (labels.length > 0) {
            await this.say(describeGestures(labels));
          }
        }
        await this.clock.sleep(this.options.monitorIntervalMs);
      }
      return false;
    } finally {
      this.watchingGestures = false;
    }
  }

  /**
   * Reads text from successive frames for `scanDurationMs`, then speaks each
   * distinct reading once, in the order first seen. A polled "stop" ends the
   * scan early; "exit" ends the session.
   */
  private async scanText(mode: TextMode): Promise<boolean> {
    await this.say('Scanning for text.');
    const startedAt = this.clock.now();
    const found = new Set<string>();

    while (this.stopping === null && this.clock.now() - startedAt < this.options.scanDurationMs) {
      const request = this.pollStopRequest();
      if (request === 'exit') {
        await this.say(GOODBYE_TEXT);
        return true;
      }
      if (request === 'stop') break;

      const frame = await this.capture();
      if (frame) {
        const reading = await this.text.read(frame, mode, this.clock.now());
        if (reading !== NO_TEXT) found.add(reading);
      }
      await this.clock.sleep(this.options.monitorIntervalMs);
    }

    await this.say(found.size > 0 ? [...found].map(toSentence).join(' ') : NO_TEXT);
    return false;
  }

  private pollStopRequest(): 'stop' | 'exit' | null {
    const polled = this.voice.poll();
    if (polled === null || !isStopRequest(polled)) return null;
    this.lastActivityAt = this.clock.now();
    return tokenize(polled).includes('exit') ? 'exit' : 'stop';
  }

  private async sayNoFrame(): Promise<boolean> {
    await this.say(NO_FRAME_TEXT);
    return false;
  }
}
