import type { Storage } from './cell.js';
import { splitWithComma } from './transforms.js';

/**
 * Storage for a comma-separated list flag.
 *
 * The argument parser and the environment pass write the raw text; the split
 * view is only refreshed by `setValue()`, which the flag set calls once per
 * resolution pass.
 */
export class StringList implements Storage<string> {
    private raw: string;
    private items: string[] = [];

    constructor(raw: string = '') {
        this.raw = raw;
    }

    get(): string {
        return this.raw;
    }

    set(raw: string): void {
        this.raw = raw;
    }

    /** Drop the split items */
    clear(): void {
        this.items = [];
    }

    /**
     * Split the current raw text into trimmed items. Empty text leaves the
     * previous items in place.
     */
    setValue(): void {
        if (this.raw !== '') {
            this.items = splitWithComma(this.raw);
        }
    }

    value(): string[] {
        return [...this.items];
    }
}
