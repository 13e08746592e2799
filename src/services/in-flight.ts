/**
 * Paths currently between detection and a finished upload attempt.
 * Lives in memory only; nothing survives a restart.
 */
export class InFlightTracker {
    private paths = new Set<string>();

    /**
     * Claims a path for processing. Returns false when another task already holds it,
     * in which case the caller should drop the event.
     */
    tryAcquire(filePath: string): boolean {
        if (this.paths.has(filePath)) {
            return false;
        }
        this.paths.add(filePath);
        return true;
    }

    release(filePath: string): void {
        this.paths.delete(filePath);
    }

    has(filePath: string): boolean {
        return this.paths.has(filePath);
    }

    get size(): number {
        return this.paths.size;
    }

    list(): string[] {
        return Array.from(this.paths);
    }
}
