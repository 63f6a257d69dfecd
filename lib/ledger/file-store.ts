/**
 * JSON documents on local disk with crash-safe writes.
 *
 * Writes go to `<file>.tmp` and are renamed over the target, so a crash
 * mid-write leaves the previous document intact. Unreadable documents are
 * moved aside to `<file>.corrupted.<YYYYMMDDHHmmss>`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CorruptStateError, PersistenceError, errorMessage } from '@/lib/errors';

export function tempPathFor(filePath: string): string {
    return `${filePath}.tmp`;
}

export function atomicWriteJson(filePath: string, data: unknown): void {
    const tempFile = tempPathFor(filePath);
    try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(tempFile, JSON.stringify(data, null, 2), 'utf8');
        fs.renameSync(tempFile, filePath);
    } catch (err) {
        removeTempFile(tempFile);
        throw new PersistenceError(`Failed to save ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }
}

/** Parsed document, or undefined when the file does not exist. */
export function readJsonDocument(filePath: string): unknown {
    if (!fs.existsSync(filePath)) return undefined;
    try {
        return JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (err) {
        throw new CorruptStateError(`Failed to read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
    }
}

/** Move a corrupt file aside; returns the new path. */
export function quarantineFile(filePath: string, now: Date = new Date()): string {
    const target = `${filePath}.corrupted.${compactTimestamp(now)}`;
    fs.renameSync(filePath, target);
    return target;
}

/** YYYYMMDDHHmmss in UTC. */
export function compactTimestamp(date: Date): string {
    return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/** YYYYMMDD in UTC. */
export function compactDate(date: Date): string {
    return compactTimestamp(date).slice(0, 8);
}

function removeTempFile(tempFile: string): void {
    if (fs.existsSync(tempFile) && fs.statSync(tempFile).isFile()) {
        fs.unlinkSync(tempFile);
    }
}
