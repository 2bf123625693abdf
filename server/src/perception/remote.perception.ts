import { z } from 'zod';
import type {
  FaceObservation,
  Frame,
  HandObservation,
  ObjectObservation,
  PerceptionAdapters,
  TextMode,
  TextObservation
} from './perception.types.js';

const RegionSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative()
});

const FacesResponseSchema = z.object({
  faces: z.array(
    z.object({
      embedding: z.array(z.number()).min(1),
      region: RegionSchema.optional()
    })
  )
});

const HandsResponseSchema = z.object({
  hands: z.array(
    z.object({
      landmarks: z.array(z.object({ x: z.number(), y: z.number(), z: z.number().optional() })),
      handedness: z.enum(['Left', 'Right']).optional()
    })
  )
});

const ObjectsResponseSchema = z.object({
  objects: z.array(
    z.object({
      label: z.string().min(1),
      confidence: z.number().min(0).max(1),
      region: RegionSchema
    })
  )
});

const TextResponseSchema = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(1)
});

export type RemotePerceptionOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/**
 * Client for the inference sidecar. Each endpoint takes the frame as base64 JSON
 * and answers with one of the response shapes above; anything else is an error.
 */
export class RemotePerception {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: RemotePerceptionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 3000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  adapters(): PerceptionAdapters {
    return {
      faces: { detectFaces: (frame) => this.detectFaces(frame) },
      hands: { detectHands: (frame) => this.detectHands(frame) },
      objects: { detectObjects: (frame) => this.detectObjects(frame) },
      text: { readText: (frame, mode) => this.readText(frame, mode) }
    };
  }

  async detectFaces(frame: Frame): Promise<FaceObservation[]> {
    const body = await this.post('/faces', frame);
    return parseOrThrow(FacesResponseSchema, body, 'faces').faces;
  }

  async detectHands(frame: Frame): Promise<HandObservation[]> {
    const body = await this.post('/hands', frame);
    return parseOrThrow(HandsResponseSchema, body, 'hands').hands;
  }

  async detectObjects(frame: Frame): Promise<ObjectObservation[]> {
    const body = await this.post('/objects', frame);
    return parseOrThrow(ObjectsResponseSchema, body, 'objects').objects;
  }

  async readText(frame: Frame, mode: TextMode): Promise<TextObservation | null> {
    const body = await this.post('/text', frame, { mode });
    if (body === null) return null;
    return parseOrThrow(TextResponseSchema, body, 'text');
  }

  private async post(route: string, frame: Frame, extra: Record<string, string> = {}): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        image_base64: frame.image.toString('base64'),
        mime: frame.mime,
        width: frame.width,
        height: frame.height,
        ...extra
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!response.ok) {
      throw new Error(`Inference ${route} failed with status ${response.status}`);
    }
    return response.json();
  }
}

function parseOrThrow<T>(schema: z.ZodType<T>, body: unknown, what: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new Error(`Invalid ${what} response from inference service`);
  }
  return result.data;
}
