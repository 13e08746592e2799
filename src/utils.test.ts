import { describe, it, expect } from 'vitest';
import { errorCode, formatError, isSupportedImage, sleep } from './utils';

describe('isSupportedImage', () => {
    it('accepts jpg, jpeg and png in any case', () => {
        for (const name of ['a.jpg', 'a.JPG', 'b.jpeg', 'b.JpEg', 'c.png', 'c.PNG', '/cam/d.Png']) {
            expect(isSupportedImage(name)).toBe(true);
        }
    });

    it('rejects other extensions and extensionless names', () => {
        for (const name of ['notes.txt', 'clip.mp4', 'photo.gif', 'photo.jpg.tmp', 'jpg', 'README', '.png.bak']) {
            expect(isSupportedImage(name)).toBe(false);
        }
    });

    it('honours a custom allow-list', () => {
        expect(isSupportedImage('scan.tiff', ['.tiff'])).toBe(true);
        expect(isSupportedImage('photo.jpg', ['.tiff'])).toBe(false);
    });
});

describe('formatError', () => {
    it('uses the message of Error instances', () => {
        expect(formatError(new Error('disk full'))).toBe('disk full');
    });

    it('stringifies anything else', () => {
        expect(formatError('boom')).toBe('boom');
        expect(formatError(42)).toBe('42');
    });
});

describe('errorCode', () => {
    it('reads the code of fs errors', () => {
        expect(errorCode(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe('ENOENT');
    });

    it('is undefined for errors without a string code', () => {
        expect(errorCode(new Error('plain'))).toBeUndefined();
        expect(errorCode(Object.assign(new Error('numeric'), { code: 42 }))).toBeUndefined();
        expect(errorCode({ code: 'ENOENT' })).toBeUndefined();
    });
});

describe('sleep', () => {
    it('resolves after the delay', async () => {
        const started = Date.now();
        await sleep(20);
        expect(Date.now() - started).toBeGreaterThanOrEqual(15);
    });
});
