import crypto from 'crypto';
import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { config } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { checkMongo, MongoStore } from './db/mongo.js';
import { IdentityGallery, JsonGallerySource, MongoGallerySource } from './identity/gallery.js';
import { IdentityResolver } from './identity/resolver.js';
import { GestureClassifier } from './gestures/classifier.js';
import { ObjectTriage } from './objects/triage.js';
import { TextReader } from './text/text_reader.js';
import { Coordinator } from './coordinator/coordinator.js';
import type { Fact } from './facts/facts.js';
import type { FrameSource } from './perception/frame_source.js';
import { PushFrameSource } from './perception/frame_source_push.js';
import { MockFrameSource } from './perception/frame_source_mock.js';
import { MockPerception } from './perception/mock.perception.js';
import { RemotePerception } from './perception/remote.perception.js';
import { GeminiPerception } from './perception/gemini.perception.js';
import type { PerceptionAdapters } from './perception/perception.types.js';
import { DeepgramTranscriber } from './adapters/deepgram.js';
import { createWsHub } from './ws/hub.js';
import { FrameMessageSchema } from './ws/schemas.js';
import { UtteranceInbox } from './voice/utterance_inbox.js';
import { WsVoiceChannel } from './voice/ws_voice.js';
import { ConsoleVoiceChannel } from './voice/console_voice.js';
import type { VoiceChannel } from './voice/voice.types.js';
import { writeSessionMetrics } from './analytics/sink.js';

const FrameBodySchema = FrameMessageSchema.omit({ type: true });

async function boot() {
  const logger = createLogger(config.logLevel);
  const fastify = Fastify({ logger, bodyLimit: 5 * 1024 * 1024 });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Perception Relay',
        version: '0.1.0'
      }
    }
  });
  await fastify.register(swaggerUI, { routePrefix: '/docs' });

  const mongo =
    config.gallerySource === 'mongo'
      ? await MongoStore.connect(config.mongoUri).catch((error: unknown) => {
          logger.warn({ error }, 'Mongo connection failed');
          return null;
        })
      : null;

  const gallery = new IdentityGallery(
    mongo ? new MongoGallerySource(mongo) : new JsonGallerySource(config.galleryPath),
    logger
  );
  await gallery.load();

  const pushFrames =
    config.frameSource === 'push' ? new PushFrameSource({ captureTimeoutMs: config.captureTimeoutMs }) : null;
  const frames: FrameSource = pushFrames ?? new MockFrameSource();

  const inbox = new UtteranceInbox();
  const transcriber = new DeepgramTranscriber(config.deepgramApiKey, logger);
  const hub = createWsHub({
    server: fastify.server,
    path: config.wsPath,
    inbox,
    frames: pushFrames,
    transcriber,
    logger
  });
  const voice: VoiceChannel =
    config.voiceMode === 'ws' ? new WsVoiceChannel(hub, inbox, logger) : new ConsoleVoiceChannel(inbox, logger);

  const perception = buildPerception(logger);
  const coordinator = new Coordinator({
    frames,
    voice,
    perception,
    identity: new IdentityResolver(gallery, {
      threshold: config.recognitionThreshold,
      cooldownMs: config.announceCooldownMs
    }),
    gestures: new GestureClassifier({ inactivityMs: config.gestureInactivityMs }),
    objects: new ObjectTriage({ retentionMs: config.trackingRetentionMs }),
    text: new TextReader(perception.text),
    logger,
    options: {
      monitorIntervalMs: config.monitorIntervalMs,
      idleTimeoutMs: config.idleTimeoutMs,
      listenTimeoutMs: config.listenTimeoutMs,
      phraseLimitMs: config.phraseLimitMs,
      gestureWatchMaxMs: config.gestureWatchMaxMs,
      scanDurationMs: config.scanDurationMs,
      factQueueSize: config.factQueueSize
    }
  });

  coordinator.on('fact', (fact: Fact) => {
    hub.broadcast({ type: 'fact', modality: fact.modality, text: fact.text, tier: fact.tier, at: Date.now() });
  });

  fastify.get('/health', {
    schema: {
      description: 'Basic health check; reports the gallery store when it is Mongo',
      response: {
        200: {
          type: 'object',
          properties: {
            ok: { type: 'boolean' },
            mongo: {
              type: 'object',
              properties: { ok: { type: 'boolean' }, error: { type: 'string' } }
            }
          }
        }
      }
    }
  }, async () => {
    if (config.gallerySource !== 'mongo') return { ok: true };
    return { ok: true, mongo: await checkMongo(mongo) };
  });

  fastify.get('/status', {
    schema: {
      description: 'Coordinator state and counters',
      response: {
        200: {
          type: 'object',
          properties: {
            running: { type: 'boolean' },
            startedAt: { type: ['number', 'null'] },
            lastActivityAt: { type: 'number' },
            watchingGestures: { type: 'boolean' },
            gestureState: { type: 'string' },
            trackedObjects: { type: 'array', items: { type: 'string' } },
            queuedFacts: { type: 'number' },
            droppedFacts: { type: 'number' },
            galleryEntries: { type: 'number' },
            voiceClients: { type: 'number' },
            shutdownReason: { type: ['string', 'null'] },
            metrics: { type: 'object', additionalProperties: { type: 'number' } }
          }
        }
      }
    }
  }, async () => ({
    ...coordinator.status(),
    galleryEntries: gallery.size,
    voiceClients: hub.clientCount()
  }));

  fastify.post('/frame', {
    schema: {
      description: 'Push a camera frame (base64 JPEG or PNG)',
      response: {
        200: {
          type: 'object',
          properties: { ok: { type: 'boolean' }, id: { type: 'string' } }
        }
      }
    }
  }, async (request, reply) => {
    if (!pushFrames) {
      return reply.code(409).send({ error: 'frames_not_accepted' });
    }
    const parsed = FrameBodySchema.safeParse(request.body);
    if (!parsed.success) {
      request.log.warn('frame payload invalid');
      return reply.code(400).send({ error: 'invalid_payload' });
    }
    const frame = pushFrames.submit({
      image: Buffer.from(parsed.data.image_base64, 'base64'),
      mime: parsed.data.mime,
      width: parsed.data.width,
      height: parsed.data.height
    });
    return { ok: true, id: frame.id };
  });

  await fastify.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(`Server listening on :${config.port}`);

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutdown requested');
    coordinator.shutdown('signal').catch((error: unknown) => logger.error({ error }, 'shutdown failed'));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const sessionId = crypto.randomUUID();
  const reason = await coordinator.run();
  hub.broadcast({ type: 'status', state: 'stopped', reason });

  const status = coordinator.status();
  await writeSessionMetrics(
    {
      sessionId,
      started_at: status.startedAt,
      duration_ms: status.startedAt === null ? 0 : Date.now() - status.startedAt,
      reason,
      dropped_facts: status.droppedFacts,
      metrics: status.metrics
    },
    config.analyticsPath
  ).catch((error: unknown) => logger.warn({ error }, 'session metrics not written'));

  await voice.close();
  await hub.close();
  await fastify.close();
  await mongo?.close();
}

function buildPerception(logger: Logger): PerceptionAdapters {
  if (config.perceptionMode === 'mock') {
    return new MockPerception().adapters();
  }
  const remote = new RemotePerception({
    baseUrl: config.inferenceUrl,
    timeoutMs: config.inferenceTimeoutMs
  }).adapters();
  if (config.objectBackend !== 'gemini') {
    return remote;
  }
  const gemini = new GeminiPerception(config.geminiApiKey, config.geminiModel);
  if (!gemini.isReady()) {
    logger.warn('Gemini API key missing, objects and text go to the inference service');
    return remote;
  }
  return { ...remote, objects: gemini, text: gemini };
}

boot().catch((error: unknown) => {
  console.error('Fatal boot error', error);
  process.exit(1);
});
