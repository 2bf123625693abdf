import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Logger } from '../logger.js';
import type { MongoStore } from '../db/mongo.js';

export const GalleryRecordSchema = z.object({
  name: z.string().min(1),
  relation: z.string().min(1).nullable().optional(),
  embeddings: z.array(z.array(z.number()).min(1))
});

export const GalleryFileSchema = z.array(GalleryRecordSchema);

export type GalleryRecord = z.infer<typeof GalleryRecordSchema>;

export type KnownIdentity = {
  name: string;
  relation: string | null;
  embedding: readonly number[];
};

export interface GallerySource {
  readonly label: string;
  loadRecords(): Promise<GalleryRecord[]>;
}

export class JsonGallerySource implements GallerySource {
  readonly label: string;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.label = `file:${this.filePath}`;
  }

  async loadRecords(): Promise<GalleryRecord[]> {
    const raw = await fs.readFile(this.filePath, 'utf8');
    const result = GalleryFileSchema.safeParse(JSON.parse(raw));
    if (!result.success) {
      throw new Error(`Invalid gallery file: ${result.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
    return result.data;
  }
}

export class MongoGallerySource implements GallerySource {
  readonly label = 'mongo:identities';
  private readonly store: Pick<MongoStore, 'listIdentities'>;

  constructor(store: Pick<MongoStore, 'listIdentities'>) {
    this.store = store;
  }

  async loadRecords(): Promise<GalleryRecord[]> {
    const docs = await this.store.listIdentities();
    return docs.flatMap((doc) => {
      const result = GalleryRecordSchema.safeParse(doc);
      return result.success ? [result.data] : [];
    });
  }
}

/**
 * The set of known identities the resolver matches against. Loaded explicitly at
 * startup (and on reload); a missing or unreadable source leaves it empty.
 */
export class IdentityGallery {
  private identities: KnownIdentity[] = [];
  private readonly source: GallerySource;
  private readonly logger: Logger;

  constructor(source: GallerySource, logger: Logger) {
    this.source = source;
    this.logger = logger;
  }

  async load(): Promise<number> {
    try {
      const records = await this.source.loadRecords();
      this.identities = expandRecords(records);
      this.logger.info(
        { source: this.source.label, people: records.length, embeddings: this.identities.length },
        'identity gallery loaded'
      );
    } catch (error) {
      this.identities = [];
      this.logger.warn(
        { source: this.source.label, error },
        'identity gallery unavailable; every face will be reported as unknown'
      );
    }
    return this.identities.length;
  }

  reload(): Promise<number> {
    return this.load();
  }

  entries(): readonly KnownIdentity[] {
    return this.identities;
  }

  get size(): number {
    return this.identities.length;
  }

  isEmpty(): boolean {
    return this.identities.length === 0;
  }
}

export function expandRecords(records: readonly GalleryRecord[]): KnownIdentity[] {
  return records.flatMap((record) =>
    record.embeddings.map((embedding) => ({
      name: record.name,
      relation: record.relation ?? null,
      embedding
    }))
  );
}
