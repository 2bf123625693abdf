export type Modality = 'face' | 'gesture' | 'object' | 'text';

export type Frame = {
  image: Buffer;
  mime: 'image/jpeg' | 'image/png' | 'application/octet-stream';
  width: number;
  height: number;
  capturedAt: number;
  id: string;
};

// Pixel coordinates, top-left origin.
export type BoundingRegion = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type DetectionRecord<TFeatures = unknown> = {
  modality: Modality;
  label: string;
  confidence: number;
  region?: BoundingRegion;
  features: TFeatures;
};

export type Landmark = {
  x: number;
  y: number;
  z?: number;
};

export type FaceObservation = {
  embedding: number[];
  region?: BoundingRegion;
};

// 21 landmarks in MediaPipe hand order (0 = wrist, 4 = thumb tip, 8 = index tip, ...).
export type HandObservation = {
  landmarks: Landmark[];
  handedness?: 'Left' | 'Right';
};

export type ObjectObservation = {
  label: string;
  confidence: number;
  region: BoundingRegion;
};

export const TextModes = ['document', 'sign', 'label', 'display', 'scene'] as const;
export type TextMode = (typeof TextModes)[number];

export type TextObservation = {
  text: string;
  confidence: number;
};

export interface FaceAdapter {
  detectFaces(frame: Frame): Promise<FaceObservation[]>;
}

export interface HandAdapter {
  detectHands(frame: Frame): Promise<HandObservation[]>;
}

export interface ObjectAdapter {
  detectObjects(frame: Frame): Promise<ObjectObservation[]>;
}

export interface TextAdapter {
  readText(frame: Frame, mode: TextMode): Promise<TextObservation | null>;
}

export type PerceptionAdapters = {
  faces: FaceAdapter;
  hands: HandAdapter;
  objects: ObjectAdapter;
  text: TextAdapter;
};

export function toObjectRecord(object: ObjectObservation): DetectionRecord<ObjectObservation> {
  return {
    modality: 'object',
    label: object.label,
    confidence: object.confidence,
    region: object.region,
    features: object
  };
}
