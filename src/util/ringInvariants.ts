// For the terms of use see COPYRIGHT.md


import type {Item, RingList} from "./RingList";
import {RingCorruptedError} from "./errors";


type Direction = "next" | "prev";

const opposite: { [direction in Direction]: Direction; } = {
    next: "prev",
    prev: "next"
};

/**
 * Walks the ring of `list` once in each direction and throws a RingCorruptedError
 * describing the first broken link. Each walk takes at most `size + 1` steps.
 */
export function checkRing<T>(list: RingList<T>): void {
    let {sentinel, size, traits} = list;

    if (!traits.equals(sentinel.value, traits.defaultValue())) {
        throw new RingCorruptedError("the sentinel holds " + traits.render(sentinel.value));
    }

    if (size === 0 && (sentinel.next !== sentinel || sentinel.prev !== sentinel)) {
        throw new RingCorruptedError("the sentinel of an empty list doesn't point to itself");
    }

    walk(sentinel, size, "next");
    walk(sentinel, size, "prev");
}

function walk<T>(sentinel: Item<T>, size: number, direction: Direction): void {
    let back = opposite[direction];
    let current = sentinel;

    for (let step = 1; step <= size + 1; ++step) {
        let following = current[direction];

        if (following[back] !== current) {
            throw new RingCorruptedError("step " + step + " following " + direction + " has no matching " + back + " link");
        }

        if (following === sentinel) {
            if (step <= size) {
                throw new RingCorruptedError(
                    "following " + direction + " returns to the sentinel after " + (step - 1) + " of " + size + " items"
                );
            }

            return;
        }

        current = following;
    }

    throw new RingCorruptedError("following " + direction + " doesn't return to the sentinel after " + size + " items");
}
