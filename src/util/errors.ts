// For the terms of use see COPYRIGHT.md


export class RingListError extends Error {
    public constructor(message: string) {
        super(message);

        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export class EmptyListError extends RingListError {
    public constructor() {
        super("The list is empty, nothing was done");
    }
}

export class IndexOutOfBoundsError extends RingListError {
    public readonly index: number;
    public readonly size: number;

    public constructor(index: number, size: number) {
        super("Index out of bounds: " + index + " (size: " + size + ")");

        this.index = index;
        this.size = size;
    }
}

// Only thrown when the links disagree with the size, i.e. the ring is broken.
export class NotFoundError extends RingListError {
    public readonly index: number;

    public constructor(index: number) {
        super("The index couldn't be found, nothing was done: " + index);

        this.index = index;
    }
}

export class RingCorruptedError extends RingListError {
    public constructor(detail: string) {
        super("Ring corrupted: " + detail);
    }
}
