import { describe, it, expect, vi } from 'vitest';
import { BlobLease } from './blob-lease';

describe('BlobLease', () => {
    it('should delete its blob once however often it is released', async () => {
        const remove = vi.fn().mockResolvedValue(undefined);
        const lease = new BlobLease('uploads', 'key-1.jpg', remove);

        expect(lease.released).toBe(false);
        await Promise.all([lease.release(), lease.release()]);
        await lease.release();

        expect(lease.released).toBe(true);
        expect(remove).toHaveBeenCalledTimes(1);
        expect(remove).toHaveBeenCalledWith('uploads', 'key-1.jpg');
    });

    it('should hand the first failure to every caller', async () => {
        const remove = vi.fn().mockRejectedValue(new Error('denied'));
        const lease = new BlobLease('uploads', 'key-2.jpg', remove);

        await expect(lease.release()).rejects.toThrow('denied');
        await expect(lease.release()).rejects.toThrow('denied');
        expect(remove).toHaveBeenCalledTimes(1);
    });

    it('should wait for a tracked write to land before deleting', async () => {
        const events: string[] = [];
        let finishWrite: () => void = () => { };
        const write = new Promise<void>((resolve) => {
            finishWrite = resolve;
        });
        const remove = vi.fn(async () => {
            events.push('delete');
        });
        const lease = new BlobLease('uploads', 'key-3.jpg', remove, 1000);
        lease.trackWrite(write.then(() => {
            events.push('write');
        }));

        const released = lease.release();
        await Promise.resolve();
        expect(remove).not.toHaveBeenCalled();

        finishWrite();
        await released;
        expect(events).toEqual(['write', 'delete']);
    });

    it('should delete after a failed write as well', async () => {
        const remove = vi.fn().mockResolvedValue(undefined);
        const lease = new BlobLease('uploads', 'key-4.jpg', remove, 1000);
        lease.trackWrite(Promise.reject(new Error('put failed')));

        await lease.release();

        expect(remove).toHaveBeenCalledWith('uploads', 'key-4.jpg');
    });

    it('should stop waiting for a stuck write after the grace period', async () => {
        const remove = vi.fn().mockResolvedValue(undefined);
        const lease = new BlobLease('uploads', 'key-5.jpg', remove, 10);
        lease.trackWrite(new Promise<void>(() => { }));

        await lease.release();

        expect(remove).toHaveBeenCalledTimes(1);
    });
});
