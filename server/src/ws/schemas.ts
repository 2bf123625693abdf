import { z } from 'zod';
import { PriorityTiers } from '../facts/facts.js';

export const UtteranceSchema = z.object({
  type: z.literal('utterance'),
  text: z.string().min(1)
});

export const AudioChunkSchema = z.object({
  type: z.literal('audio_chunk'),
  pcm16_base64: z.string().min(1),
  sampleRate: z.number().min(8000),
  t_ms: z.number().nonnegative().optional()
});

export const FrameMessageSchema = z.object({
  type: z.literal('frame'),
  image_base64: z.string().min(1),
  mime: z.enum(['image/jpeg', 'image/png']),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional()
});

export const SpeechDoneSchema = z.object({
  type: z.literal('speech_done'),
  id: z.string().min(1)
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  UtteranceSchema,
  AudioChunkSchema,
  FrameMessageSchema,
  SpeechDoneSchema
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type FrameMessage = z.infer<typeof FrameMessageSchema>;

export const SpeechSchema = z.object({
  type: z.literal('speech'),
  id: z.string().min(1),
  text: z.string().min(1)
});

export const FactMessageSchema = z.object({
  type: z.literal('fact'),
  modality: z.enum(['face', 'gesture', 'object', 'text', 'system']),
  text: z.string().min(1),
  tier: z.enum(PriorityTiers),
  at: z.number().nonnegative()
});

export const StatusMessageSchema = z.object({
  type: z.literal('status'),
  state: z.enum(['starting', 'running', 'stopped']),
  reason: z.string().optional()
});

export const ErrorSchema = z.object({
  type: z.literal('error'),
  code: z.string().min(1),
  message: z.string().min(1)
});

export type SpeechMessage = z.infer<typeof SpeechSchema>;
export type FactMessage = z.infer<typeof FactMessageSchema>;
export type StatusMessage = z.infer<typeof StatusMessageSchema>;
export type ErrorMessage = z.infer<typeof ErrorSchema>;

export type ServerMessage = SpeechMessage | FactMessage | StatusMessage | ErrorMessage;
