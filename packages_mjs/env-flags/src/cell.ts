/**
 * A writable location owned by the caller. The flag set writes the default
 * into it at registration and the resolved value during parsing.
 */
export interface Storage<T> {
    get(): T;
    set(value: T): void;
}

export class Cell<T> implements Storage<T> {
    constructor(private current: T) { }

    get value(): T {
        return this.current;
    }

    get(): T {
        return this.current;
    }

    set(value: T): void {
        this.current = value;
    }
}
