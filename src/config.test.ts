import { afterEach, describe, it, expect } from 'vitest';
import { intFromEnv } from './config';

const NAME = 'IMAGE_UPLOADER_TEST_INT';

describe('intFromEnv', () => {
    afterEach(() => {
        delete process.env[NAME];
    });

    it('falls back when unset or blank', () => {
        expect(intFromEnv(NAME, 30000)).toBe(30000);
        process.env[NAME] = '  ';
        expect(intFromEnv(NAME, 30000)).toBe(30000);
    });

    it('parses non-negative integers, zero included', () => {
        process.env[NAME] = '0';
        expect(intFromEnv(NAME, 30000)).toBe(0);
        process.env[NAME] = '1500';
        expect(intFromEnv(NAME, 30000)).toBe(1500);
    });

    it('rejects negative or fractional values', () => {
        process.env[NAME] = '-1';
        expect(() => intFromEnv(NAME, 1)).toThrow(`${NAME} must be a non-negative integer, got "-1"`);
        process.env[NAME] = '2.5';
        expect(() => intFromEnv(NAME, 1)).toThrow(`${NAME} must be a non-negative integer, got "2.5"`);
        process.env[NAME] = 'soon';
        expect(() => intFromEnv(NAME, 1)).toThrow(`${NAME} must be a non-negative integer, got "soon"`);
    });
});
