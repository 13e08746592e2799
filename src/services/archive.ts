import * as fs from 'fs';
import * as path from 'path';
import { errorCode } from '../utils';

export function resolveArchivePath(directory: string, fileName: string): string {
    const destination = path.join(directory, fileName);
    if (!fs.existsSync(destination)) {
        return destination;
    }

    const ext = path.extname(fileName);
    const base = fileName.slice(0, fileName.length - ext.length);
    let counter = 1;
    while (fs.existsSync(path.join(directory, `${base}_${counter}${ext}`))) {
        counter++;
    }
    return path.join(directory, `${base}_${counter}${ext}`);
}

/**
 * Moves a file, copying and unlinking when source and destination sit on different devices.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
    try {
        await fs.promises.rename(source, destination);
    } catch (error) {
        if (errorCode(error) !== 'EXDEV') {
            throw error;
        }
        await fs.promises.copyFile(source, destination, fs.constants.COPYFILE_EXCL);
        await fs.promises.unlink(source);
    }
}
