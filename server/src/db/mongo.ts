import { MongoClient, Db, Collection } from 'mongodb';

export type IdentityDoc = {
  name: string;
  relation?: string | null;
  embeddings: number[][];
  updatedAt?: Date;
};

export class MongoStore {
  private readonly client: MongoClient;
  private readonly db: Db;
  readonly identities: Collection<IdentityDoc>;

  private constructor(client: MongoClient, db: Db) {
    this.client = client;
    this.db = db;
    this.identities = db.collection<IdentityDoc>('identities');
  }

  static async connect(uri: string): Promise<MongoStore | null> {
    if (!uri) return null;
    const client = new MongoClient(uri);
    await client.connect();
    const db = client.db();
    const store = new MongoStore(client, db);
    await store.ensureIndexes();
    return store;
  }

  async ensureIndexes() {
    await this.identities.createIndex({ name: 1 });
  }

  async listIdentities(): Promise<IdentityDoc[]> {
    return this.identities
      .find({}, { projection: { _id: 0, name: 1, relation: 1, embeddings: 1 } })
      .toArray();
  }

  async ping(): Promise<void> {
    await this.db.command({ ping: 1 });
  }

  async close() {
    await this.client.close();
  }
}

export type ServiceCheck = { ok: boolean; error?: string };

// `null` means the gallery was not configured for Mongo, or the connection failed at boot.
export async function checkMongo(store: Pick<MongoStore, 'ping'> | null): Promise<ServiceCheck> {
  if (!store) return { ok: false, error: 'not_connected' };
  return store
    .ping()
    .then(() => ({ ok: true }))
    .catch((error: unknown) => ({ ok: false, error: error instanceof Error ? error.message : String(error) }));
}
