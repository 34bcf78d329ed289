import { TargetPlatform } from '../types/config';
import { LibraryEntry } from './schema';

/**
 * Decide whether a library entry applies to the target platform.
 * Only the first rule's OS name is consulted; later rules and the rule
 * action are ignored. A first rule without an OS clause excludes the entry.
 */
export function isApplicable(entry: LibraryEntry, targetPlatform: string): boolean {
    const first = entry.rules?.[0];
    if (first === undefined) {
        return true;
    }
    return first.os?.name === targetPlatform;
}

/**
 * Lazily yield the entries that apply to the target platform
 */
export function* applicable(
    entries: Iterable<LibraryEntry>,
    targetPlatform: string,
): Generator<LibraryEntry, void, undefined> {
    for (const entry of entries) {
        if (isApplicable(entry, targetPlatform)) {
            yield entry;
        }
    }
}

export function currentPlatform(platform: NodeJS.Platform = process.platform): TargetPlatform {
    switch (platform) {
        case 'win32':
            return 'windows';
        case 'darwin':
            return 'osx';
        default:
            return 'linux';
    }
}
