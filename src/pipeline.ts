import * as fs from 'fs';
import * as path from 'path';
import { FileCreatedEvent, PipelineStats, UploadClient } from './types';
import { errorCode, formatError, isSupportedImage, sleep } from './utils';
import { InFlightTracker } from './services/in-flight';
import { moveFile, resolveArchivePath } from './services/archive';

export interface PipelineOptions {
    uploadedFolder: string;
    uploader: UploadClient;
    debounceMs: number;
    tracker?: InFlightTracker;
    supportedExtensions?: string[];
}

export class UploadPipeline {
    private uploader: UploadClient;
    private tracker: InFlightTracker;
    private tasks = new Set<Promise<void>>();
    private stats: PipelineStats = {
        uploaded: 0,
        failed: 0,
        vanished: 0,
        errors: 0,
    };

    constructor(private options: PipelineOptions) {
        this.uploader = options.uploader;
        this.tracker = options.tracker ?? new InFlightTracker();
    }

    /**
     * Starts processing a newly created entry in the background.
     * Returns false when the event is dropped: a directory, an unsupported file,
     * or a path that is already being processed.
     */
    handleCreated(event: FileCreatedEvent): boolean {
        if (event.isDirectory) {
            return false;
        }
        if (!isSupportedImage(event.path, this.options.supportedExtensions)) {
            return false;
        }
        if (!this.tracker.tryAcquire(event.path)) {
            return false;
        }

        const task = this.processFile(event.path).finally(() => {
            this.tasks.delete(task);
        });
        this.tasks.add(task);
        return true;
    }

    /** Resolves once every task started so far has finished. */
    async whenIdle(): Promise<void> {
        while (this.tasks.size > 0) {
            await Promise.all(this.tasks);
        }
    }

    getStats(): PipelineStats {
        return { ...this.stats };
    }

    private async processFile(filePath: string): Promise<void> {
        try {
            // Wait for file to be completely written
            await sleep(this.options.debounceMs);

            if (!fs.existsSync(filePath)) {
                this.stats.vanished++;
                console.warn(`File no longer exists: ${filePath}`);
                return;
            }

            const result = await this.uploader.upload(filePath);

            if (result.ok) {
                const fileName = path.basename(filePath);
                const destination = resolveArchivePath(this.options.uploadedFolder, fileName);
                await moveFile(filePath, destination);
                this.stats.uploaded++;
                console.log(`Successfully uploaded and moved: ${fileName}`);
            } else {
                this.stats.failed++;
                console.error(`Failed to upload: ${filePath}`);
                console.error(`Error: ${result.reason}`);
            }
        } catch (error) {
            if (errorCode(error) === 'ENOENT' && !fs.existsSync(filePath)) {
                this.stats.vanished++;
                console.warn(`File no longer exists: ${filePath}`);
                return;
            }
            this.stats.errors++;
            console.error(`Error processing ${filePath}: ${formatError(error)}`);
        } finally {
            this.tracker.release(filePath);
        }
    }

    public handleShutdown(): void {
        console.log('\n' + '='.repeat(60));
        console.log('Session Summary');
        console.log('='.repeat(60));
        console.log(`Uploaded: ${this.stats.uploaded}`);
        console.log(`Failed:   ${this.stats.failed}`);
        console.log(`Vanished: ${this.stats.vanished}`);
        console.log(`Errors:   ${this.stats.errors}`);

        if (this.tracker.size > 0) {
            console.log(`Abandoning ${this.tracker.size} in-flight file(s), they stay in the watch folder:`);
            for (const filePath of this.tracker.list()) {
                console.log(`  ${filePath}`);
            }
        }
        console.log('='.repeat(60));
    }
}
