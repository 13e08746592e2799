#!/usr/bin/env node
import * as fs from 'fs';
import { CONFIG } from './config';
import { UploadPipeline } from './pipeline';
import { HttpUploadClient } from './services/upload';
import { FolderWatcher } from './services/watcher';
import { formatError } from './utils';

async function main() {
    // Create uploaded folder if it doesn't exist
    fs.mkdirSync(CONFIG.watch.uploadedFolder, { recursive: true });

    const pipeline = new UploadPipeline({
        uploadedFolder: CONFIG.watch.uploadedFolder,
        uploader: new HttpUploadClient(CONFIG.upload.url, CONFIG.upload.timeout),
        debounceMs: CONFIG.options.debounceMs,
        supportedExtensions: CONFIG.options.supportedExtensions,
    });
    const watcher = new FolderWatcher(CONFIG.watch.folder, event => {
        pipeline.handleCreated(event);
    });

    await watcher.start();
    console.log(`Monitoring folder: ${CONFIG.watch.folder}`);
    console.log(`Uploading to: ${CONFIG.upload.url}`);

    let stopping = false;
    const shutdown = () => {
        if (stopping) return;
        stopping = true;
        pipeline.handleShutdown();
        watcher.stop()
            .then(() => {
                console.log('\nMonitoring stopped');
                process.exit(0);
            })
            .catch((error: unknown) => {
                console.error(`Failed to stop watcher: ${formatError(error)}`);
                process.exit(1);
            });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('\nStartup failed:', formatError(error));
        process.exit(1);
    });
}
