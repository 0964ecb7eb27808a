import { MongoClient, type Db } from 'mongodb';

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectToDatabase(mongoUri: string): Promise<Db> {
    if (db) return db;

    client = new MongoClient(mongoUri);
    await client.connect();

    // Extract database name from URI or default to 'picprompt'
    const dbName = new URL(mongoUri).pathname.replace('/', '') || 'picprompt';
    db = client.db(dbName);

    console.info('✅ Connected to MongoDB blob storage');
    return db;
}

export async function disconnectFromDatabase(): Promise<void> {
    if (client) {
        await client.close();
        client = null;
        db = null;
        console.info('🔌 Disconnected from MongoDB');
    }
}

