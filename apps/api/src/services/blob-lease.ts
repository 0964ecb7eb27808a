/**
 * Ownership of one temporary blob. `release` deletes it at most once;
 * later calls share the first deletion's outcome.
 *
 * A write handed to `trackWrite` is waited for (at most `writeGraceMs`)
 * before the delete, so an upload that outlived its timeout cannot land
 * after the blob was removed.
 */
export class BlobLease {
    private releasing: Promise<void> | null = null;
    private pendingWrite: Promise<void> | null = null;

    constructor(
        public readonly bucket: string,
        public readonly key: string,
        private readonly remove: (bucket: string, key: string) => Promise<void>,
        private readonly writeGraceMs = 0
    ) { }

    get released(): boolean {
        return this.releasing !== null;
    }

    /** The write's own outcome is reported by whoever awaits it; here only its settling matters. */
    trackWrite(write: Promise<void>): void {
        this.pendingWrite = write.then(() => undefined, () => undefined);
    }

    release(): Promise<void> {
        if (!this.releasing) {
            this.releasing = this.settleWrite().then(() => this.remove(this.bucket, this.key));
        }
        return this.releasing;
    }

    private async settleWrite(): Promise<void> {
        if (!this.pendingWrite) return;

        let graceHandle: NodeJS.Timeout | undefined;
        const grace = new Promise<void>((resolve) => {
            graceHandle = setTimeout(resolve, this.writeGraceMs);
        });

        try {
            await Promise.race([this.pendingWrite, grace]);
        } finally {
            clearTimeout(graceHandle);
        }
    }
}
