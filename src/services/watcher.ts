import {watch, FSWatcher} from 'chokidar';
import * as fs from 'fs';
import {FileCreatedEvent} from '../types';
import {formatError} from '../utils';

export type FileCreatedListener = (event: FileCreatedEvent) => void;

/**
 * Reports entries created directly inside one folder. Subfolders are not descended into
 * and entries present before start() are not reported.
 */
export class FolderWatcher {
    private watcher?: FSWatcher;

    constructor(private folder: string, private onCreated: FileCreatedListener) {}

    async start(): Promise<void> {
        if (this.watcher) {
            throw new Error(`Already watching ${this.folder}`);
        }
        // chokidar reports ready on a missing folder and then never emits
        const stats = await fs.promises.stat(this.folder);
        if (!stats.isDirectory()) {
            throw new Error(`Not a directory: ${this.folder}`);
        }

        const watcher = watch(this.folder, {
            depth: 0,
            ignoreInitial: true,
            persistent: true,
        });
        this.watcher = watcher;

        watcher.on('add', (filePath: string) => this.onCreated({path: filePath, isDirectory: false}));
        watcher.on('addDir', (dirPath: string) => {
            // chokidar also reports the watched folder itself
            if (dirPath !== this.folder) {
                this.onCreated({path: dirPath, isDirectory: true});
            }
        });
        watcher.on('error', (error: unknown) => {
            console.error(`Watcher error on ${this.folder}: ${formatError(error)}`);
        });

        await new Promise<void>(resolve => watcher.once('ready', () => resolve()));
    }

    async stop(): Promise<void> {
        if (!this.watcher) {
            return;
        }
        const watcher = this.watcher;
        this.watcher = undefined;
        await watcher.close();
    }

    isActive(): boolean {
        return this.watcher !== undefined;
    }
}
