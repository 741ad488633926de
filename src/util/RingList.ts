// For the terms of use see COPYRIGHT.md


import {EmptyListError, IndexOutOfBoundsError, NotFoundError} from "./errors";
import type {ElementTraits} from "./traits";
import type {Logger} from "../Logger";


export class Item<T> {
    public value: T;
    public prev: Item<T>;
    public next: Item<T>;

    public constructor(value: T, prev?: Item<T>, next?: Item<T>) {
        this.value = value;
        this.prev = this.next = this;

        if (typeof prev !== "undefined") {
            this.prev = prev;
        }

        if (typeof next !== "undefined") {
            this.next = next;
        }
    }

    public detach(): void {
        this.prev.next = this.next;
        this.next.prev = this.prev;
        this.prev = this.next = this;
    }
}

export interface Rendering {
    separator: string;
    terminator: string;
}

export const defaultRendering: Readonly<Rendering> = {
    separator: " -> ",
    terminator: "(sentinel)"
};

export interface RingListOptions {
    logger?: Logger;
    rendering?: Partial<Rendering>;
}

/**
 * Doubly linked list closed into a ring by a sentinel item.
 *
 * New values go to the front, right after the sentinel. The sentinel carries
 * the element type's default value and is never counted or rendered.
 */
export class RingList<T> {
    public readonly sentinel: Item<T>;
    public readonly traits: ElementTraits<T>;
    private count: number;
    private logger: Logger | null;
    private rendering: Rendering;

    public constructor(traits: ElementTraits<T>, options: RingListOptions = {}) {
        this.traits = traits;
        this.sentinel = new Item(traits.defaultValue());
        this.count = 0;
        this.logger = typeof options.logger === "undefined" ? null : options.logger;
        this.rendering = Object.assign({}, defaultRendering, options.rendering);
    }

    public static newList<T>(traits: ElementTraits<T>, options: RingListOptions = {}): RingList<T> {
        return new RingList<T>(traits, options);
    }

    public get size(): number {
        return this.count;
    }

    public isEmpty(): boolean {
        return this.count === 0;
    }

    public add(value: T): void {
        let first = this.sentinel.next;
        let item = new Item(value, this.sentinel, first);

        // If the list was empty, this is the sentinel's own back link.
        first.prev = item;
        this.sentinel.next = item;

        ++this.count;

        this.debug((): string => "Added " + this.traits.render(value) + " (size: " + this.count + ")");
    }

    /**
     * Unlinks the item at `index` (0 being the most recently added one) and returns its value.
     *
     * @throws EmptyListError
     * @throws IndexOutOfBoundsError also for negative and fractional indices
     * @throws NotFoundError if the ring is shorter than the size says
     */
    public removeIndex(index: number): T {
        if (this.isEmpty()) {
            throw new EmptyListError();
        }

        if (!Number.isInteger(index) || index < 0 || index >= this.count) {
            throw new IndexOutOfBoundsError(index, this.count);
        }

        let current = this.sentinel.next;

        for (let i = 0; i < this.count && current !== this.sentinel; ++i) {
            if (i === index) {
                current.detach();
                --this.count;

                let removed = current.value;

                this.debug((): string =>
                    "Removed " + this.traits.render(removed) + " at " + index + " (size: " + this.count + ")"
                );

                return removed;
            }

            current = current.next;
        }

        let err = new NotFoundError(index);

        if (this.logger !== null) {
            this.logger.critical(err);
        }

        throw err;
    }

    public indexOf(value: T): number | null {
        let current = this.sentinel.next;

        for (let i = 0; i < this.count; ++i) {
            if (this.traits.equals(current.value, value)) {
                return i;
            }

            current = current.next;
        }

        return null;
    }

    public render(): string {
        let parts: string[] = [];
        let current = this.sentinel.next;

        for (let i = 0; i < this.count; ++i) {
            parts.push(this.traits.render(current.value) + this.rendering.separator);
            current = current.next;
        }

        return parts.join("") + this.rendering.terminator + "\n";
    }

    public toString(): string {
        return this.render();
    }

    private debug(message: () => string): void {
        if (this.logger !== null) {
            this.logger.debug(message);
        }
    }
}
