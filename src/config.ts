import * as path from 'path';
import * as os from 'os';
import * as dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

export function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

const watchFolder = process.env.WATCH_FOLDER || path.join(os.homedir(), 'cam');

export const CONFIG = {
    watch: {
        folder: watchFolder,
        uploadedFolder: process.env.UPLOADED_FOLDER || path.join(watchFolder, 'uploaded'),
    },
    upload: {
        url: process.env.UPLOAD_URL || 'http://localhost:8080/upload.php',
        timeout: intFromEnv('UPLOAD_TIMEOUT_MS', 120000),
    },
    options: {
        // Give the camera time to finish writing before uploading
        debounceMs: intFromEnv('DEBOUNCE_MS', 30000),
        supportedExtensions: ['.jpg', '.jpeg', '.png'],
    }
};
