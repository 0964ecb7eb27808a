import { GridFSBucket, type Db, type ObjectId } from 'mongodb';
import type { BlobStore } from '../../domain/pipeline/interfaces';
import { PipelineErrorCode, StorageError } from '../../domain/errors';

/**
 * Blob store on MongoDB GridFS. Each logical bucket maps to a GridFS bucket
 * (`<bucket>.files` / `<bucket>.chunks`); object names are GridFS filenames.
 */
export class GridFsBlobStore implements BlobStore {
    private readonly buckets = new Map<string, GridFSBucket>();

    constructor(private readonly db: Db) { }

    private bucketFor(bucketName: string): GridFSBucket {
        let bucket = this.buckets.get(bucketName);
        if (!bucket) {
            bucket = new GridFSBucket(this.db, { bucketName });
            this.buckets.set(bucketName, bucket);
        }
        return bucket;
    }

    private async findIds(bucket: GridFSBucket, name: string): Promise<ObjectId[]> {
        const files = await bucket.find({ filename: name }).sort({ uploadDate: -1 }).toArray();
        return files.map(f => f._id);
    }

    async put(bucketName: string, name: string, bytes: Buffer): Promise<void> {
        const bucket = this.bucketFor(bucketName);
        try {
            const previous = await this.findIds(bucket, name);

            await new Promise<void>((resolve, reject) => {
                const upload = bucket.openUploadStream(name);
                upload.once('finish', () => resolve());
                upload.once('error', reject);
                upload.end(bytes);
            });

            // Overwrite: older revisions go only after the new one is durable
            for (const id of previous) {
                await bucket.delete(id);
            }
        } catch (error) {
            throw new StorageError(
                PipelineErrorCode.STORAGE_UPLOAD_FAILED,
                `Failed to store "${name}" in bucket "${bucketName}"`,
                error
            );
        }
    }

    async get(bucketName: string, name: string): Promise<Buffer | null> {
        const bucket = this.bucketFor(bucketName);
        try {
            const [latest] = await this.findIds(bucket, name);
            if (!latest) return null;

            const chunks: Buffer[] = [];
            for await (const chunk of bucket.openDownloadStream(latest)) {
                chunks.push(Buffer.from(chunk));
            }
            return Buffer.concat(chunks);
        } catch (error) {
            throw new StorageError(
                PipelineErrorCode.STORAGE_READ_FAILED,
                `Failed to read "${name}" from bucket "${bucketName}"`,
                error
            );
        }
    }

    async delete(bucketName: string, name: string): Promise<void> {
        const bucket = this.bucketFor(bucketName);
        try {
            const ids = await this.findIds(bucket, name);
            for (const id of ids) {
                await bucket.delete(id);
            }
        } catch (error) {
            throw new StorageError(
                PipelineErrorCode.STORAGE_DELETE_FAILED,
                `Failed to delete "${name}" from bucket "${bucketName}"`,
                error
            );
        }
    }
}
