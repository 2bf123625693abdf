import { GoogleGenerativeAI } from '@google/generative-ai';
import { z } from 'zod';
import { OBJECTS_PROMPT, textPrompt } from './perception.prompt.js';
import type {
  Frame,
  ObjectAdapter,
  ObjectObservation,
  TextAdapter,
  TextMode,
  TextObservation
} from './perception.types.js';

const FractionSchema = z.number().min(0).max(1);

const RawObjectsSchema = z.object({
  objects: z
    .array(
      z.object({
        label: z.string().min(1),
        confidence: FractionSchema.optional(),
        box: z.object({ x: FractionSchema, y: FractionSchema, width: FractionSchema, height: FractionSchema })
      })
    )
    .max(12)
});

const RawTextSchema = z.object({
  text: z.string(),
  confidence: FractionSchema.optional()
});

/**
 * Gemini as an object detector and OCR engine. Faces and hands still come from
 * the inference sidecar; Gemini does not produce embeddings or landmarks.
 */
export class GeminiPerception implements ObjectAdapter, TextAdapter {
  private readonly client?: GoogleGenerativeAI;
  private readonly model: string;

  constructor(apiKey: string | undefined, model: string) {
    this.model = model;
    if (apiKey) {
      this.client = new GoogleGenerativeAI(apiKey);
    }
  }

  isReady(): boolean {
    return Boolean(this.client);
  }

  async detectObjects(frame: Frame): Promise<ObjectObservation[]> {
    const parsed = await this.ask(OBJECTS_PROMPT, frame, RawObjectsSchema);
    return parsed.objects.map((object) => ({
      label: object.label.trim().toLowerCase(),
      confidence: object.confidence ?? 0.5,
      region: {
        x: object.box.x * frame.width,
        y: object.box.y * frame.height,
        width: object.box.width * frame.width,
        height: object.box.height * frame.height
      }
    }));
  }

  async readText(frame: Frame, mode: TextMode): Promise<TextObservation | null> {
    const parsed = await this.ask(textPrompt(mode), frame, RawTextSchema);
    const text = parsed.text.trim();
    if (!text) return null;
    return { text, confidence: parsed.confidence ?? 0.6 };
  }

  // One retry: Gemini occasionally wraps or truncates the JSON.
  private async ask<T>(prompt: string, frame: Frame, schema: z.ZodType<T>): Promise<T> {
    const client = this.client;
    if (!client) {
      throw new Error('Gemini API key missing');
    }

    const attempt = async (): Promise<T> => {
      const model = client.getGenerativeModel({
        model: this.model,
        generationConfig: { responseMimeType: 'application/json' }
      });
      const result = await model.generateContent([
        { text: prompt },
        { inlineData: { data: frame.image.toString('base64'), mimeType: imageMime(frame) } }
      ]);
      return parseJson(result.response.text(), schema);
    };

    try {
      return await attempt();
    } catch {
      return await attempt();
    }
  }
}

export function parseJson<T>(text: string, schema: z.ZodType<T>): T {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) {
    throw new Error('Invalid JSON from Gemini');
  }
  const candidate: unknown = JSON.parse(text.slice(start, end + 1));
  const result = schema.safeParse(candidate);
  if (!result.success) {
    throw new Error('Invalid JSON from Gemini');
  }
  return result.data;
}

function imageMime(frame: Frame): string {
  return frame.mime === 'application/octet-stream' ? 'image/jpeg' : frame.mime;
}
