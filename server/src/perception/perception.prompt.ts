import type { TextMode } from './perception.types.js';

export const OBJECTS_PROMPT = [
  'Return STRICT JSON only. No markdown or code fences.',
  'Output keys: objects.',
  'Rules:',
  '- objects: up to 12 entries of { label, confidence, box }.',
  '- label: lowercase COCO-style noun (person, car, chair, cup, door, stairs, ...).',
  '- confidence: 0..1.',
  '- box: { x, y, width, height } as fractions 0..1 of the image, top-left origin.',
  '- Do not identify people or describe sensitive attributes.'
].join('\n');

const TEXT_HINTS: Record<TextMode, string> = {
  document: 'The image shows a page of printed text; keep reading order.',
  sign: 'The image shows a sign; return only the sign text.',
  label: 'The image shows a product label; return the main label text.',
  display: 'The image shows a screen or display; return the visible text.',
  scene: 'Return any legible text visible in the scene.'
};

export function textPrompt(mode: TextMode): string {
  return [
    'Return STRICT JSON only. No markdown or code fences.',
    'Output keys: text, confidence.',
    TEXT_HINTS[mode],
    '- text: the transcribed text, empty string if none is legible.',
    '- confidence: 0..1.'
  ].join('\n');
}
