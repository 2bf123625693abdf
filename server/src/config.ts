import { z } from 'zod';
import { loadEnv } from './load_env.js';

loadEnv();

const envSchema = z.object({
  PORT: z.coerce.number().default(8080),
  WS_PATH: z.string().default('/ws'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FRAME_SOURCE: z.enum(['push', 'mock']).default('mock'),
  CAPTURE_TIMEOUT_MS: z.coerce.number().default(1000),
  PERCEPTION_MODE: z.enum(['mock', 'live']).default('mock'),
  INFERENCE_URL: z.string().default('http://127.0.0.1:8500'),
  INFERENCE_TIMEOUT_MS: z.coerce.number().default(3000),
  OBJECT_BACKEND: z.enum(['gemini', 'remote']).default('gemini'),
  GEMINI_API_KEY: z.string().optional().default(''),
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
  DEEPGRAM_API_KEY: z.string().optional().default(''),
  VOICE_MODE: z.enum(['ws', 'console']).default('console'),
  GALLERY_SOURCE: z.enum(['file', 'mongo']).default('file'),
  GALLERY_PATH: z.string().default('./data/gallery.json'),
  MONGO_URI: z.string().default('mongodb://localhost:27017/perception'),
  RECOGNITION_THRESHOLD: z.coerce.number().positive().default(0.6),
  ANNOUNCE_COOLDOWN_MS: z.coerce.number().nonnegative().default(5000),
  GESTURE_INACTIVITY_MS: z.coerce.number().positive().default(2000),
  TRACKING_RETENTION_MS: z.coerce.number().positive().default(5000),
  MONITOR_INTERVAL_MS: z.coerce.number().positive().default(100),
  IDLE_TIMEOUT_MS: z.coerce.number().positive().default(300_000),
  LISTEN_TIMEOUT_MS: z.coerce.number().positive().default(5000),
  PHRASE_LIMIT_MS: z.coerce.number().positive().default(5000),
  GESTURE_WATCH_MAX_MS: z.coerce.number().positive().default(30_000),
  SCAN_DURATION_MS: z.coerce.number().positive().default(5000),
  FACT_QUEUE_SIZE: z.coerce.number().int().positive().default(16),
  ANALYTICS_PATH: z.string().default('./analytics_out/sessions.jsonl')
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables', parsed.error.format());
  throw new Error('Invalid environment');
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  wsPath: env.WS_PATH,
  logLevel: env.LOG_LEVEL,
  frameSource: env.FRAME_SOURCE,
  captureTimeoutMs: env.CAPTURE_TIMEOUT_MS,
  perceptionMode: env.PERCEPTION_MODE,
  inferenceUrl: env.INFERENCE_URL,
  inferenceTimeoutMs: env.INFERENCE_TIMEOUT_MS,
  objectBackend: env.OBJECT_BACKEND,
  geminiApiKey: env.GEMINI_API_KEY,
  geminiModel: env.GEMINI_MODEL,
  deepgramApiKey: env.DEEPGRAM_API_KEY,
  voiceMode: env.VOICE_MODE,
  gallerySource: env.GALLERY_SOURCE,
  galleryPath: env.GALLERY_PATH,
  mongoUri: env.MONGO_URI,
  recognitionThreshold: env.RECOGNITION_THRESHOLD,
  announceCooldownMs: env.ANNOUNCE_COOLDOWN_MS,
  gestureInactivityMs: env.GESTURE_INACTIVITY_MS,
  trackingRetentionMs: env.TRACKING_RETENTION_MS,
  monitorIntervalMs: env.MONITOR_INTERVAL_MS,
  idleTimeoutMs: env.IDLE_TIMEOUT_MS,
  listenTimeoutMs: env.LISTEN_TIMEOUT_MS,
  phraseLimitMs: env.PHRASE_LIMIT_MS,
  gestureWatchMaxMs: env.GESTURE_WATCH_MAX_MS,
  scanDurationMs: env.SCAN_DURATION_MS,
  factQueueSize: env.FACT_QUEUE_SIZE,
  analyticsPath: env.ANALYTICS_PATH
};

export type AppConfig = typeof config;
