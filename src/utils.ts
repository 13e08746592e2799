import * as path from 'path';

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'];

export async function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function isSupportedImage(filePath: string, extensions: string[] = IMAGE_EXTENSIONS): boolean {
    return extensions.includes(path.extname(filePath).toLowerCase());
}

export function formatError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** The errno code of a failed fs call, such as ENOENT or EXDEV. */
export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
