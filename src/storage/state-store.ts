import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { debug } from '../output/logger';

/**
 * Whole-value persistence for small pieces of process state (quota counter,
 * search cache). Implementations may be swapped for an embedded key-value
 * store or a locked file without touching the callers.
 */
export interface StateStore<T> {
    /** Returns undefined when nothing usable is stored. */
    load(): T | undefined;
    save(value: T): void;
}

/**
 * JSON file store. Missing, unreadable, unparsable or schema-invalid files
 * read as undefined; the next save() rewrites the file.
 *
 * There is no cross-process locking: two processes sharing a file may lose
 * each other's updates.
 */
export class JsonFileStore<T> implements StateStore<T> {
    readonly filePath: string;

    constructor(
        filePath: string,
        private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        cwd: string = process.cwd()
    ) {
        this.filePath = path.resolve(cwd, filePath);
    }

    load(): T | undefined {
        if (!existsSync(this.filePath)) return undefined;

        try {
            const raw = readFileSync(this.filePath, 'utf-8');
            const json: unknown = JSON.parse(raw);
            const result = this.schema.safeParse(json);

            if (!result.success) {
                debug(`Ignoring invalid state in ${this.filePath}: ${result.error.message}`);
                return undefined;
            }
            return result.data;
        } catch (e: unknown) {
            const msg = e instanceof Error ? e.message : String(e);
            debug(`Could not read ${this.filePath}, starting fresh: ${msg}`);
            return undefined;
        }
    }

    /**
     * Writes to a sibling temp file and renames it over the target so readers
     * never observe a half-written file. Throws on I/O failure.
     */
    save(value: T): void {
        const dir = path.dirname(this.filePath);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }

        const tmpFile = `${this.filePath}.${process.pid}.tmp`;
        writeFileSync(tmpFile, JSON.stringify(value), 'utf-8');
        renameSync(tmpFile, this.filePath);
    }
}

/**
 * In-process store. Values are cloned on the way in and out so callers
 * cannot mutate what is "persisted".
 */
export class MemoryStore<T> implements StateStore<T> {
    private value: T | undefined;

    constructor(initial?: T) {
        this.value = initial === undefined ? undefined : structuredClone(initial);
    }

    load(): T | undefined {
        return this.value === undefined ? undefined : structuredClone(this.value);
    }

    save(value: T): void {
        this.value = structuredClone(value);
    }
}
