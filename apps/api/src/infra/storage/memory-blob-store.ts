import type { BlobStore } from '../../domain/pipeline/interfaces';

/**
 * Process-local blob store. Backs `BLOB_STORE_DRIVER=memory`, the CLI script and tests.
 * Buffers are copied on the way in and out so callers cannot mutate stored bytes.
 */
export class InMemoryBlobStore implements BlobStore {
    private readonly objects = new Map<string, Buffer>();

    private key(bucket: string, name: string): string {
        return `${bucket}/${name}`;
    }

    async put(bucket: string, name: string, bytes: Buffer): Promise<void> {
        this.objects.set(this.key(bucket, name), Buffer.from(bytes));
    }

    async get(bucket: string, name: string): Promise<Buffer | null> {
        const stored = this.objects.get(this.key(bucket, name));
        return stored ? Buffer.from(stored) : null;
    }

    async delete(bucket: string, name: string): Promise<void> {
        this.objects.delete(this.key(bucket, name));
    }

    /** Names currently held in `bucket`. */
    list(bucket: string): string[] {
        const prefix = `${bucket}/`;
        return [...this.objects.keys()]
            .filter(k => k.startsWith(prefix))
            .map(k => k.slice(prefix.length));
    }
}
