// For the terms of use see COPYRIGHT.md


export interface ElementTraits<T> {
    defaultValue(): T;
    equals(a: T, b: T): boolean;
    render(value: T): string;
}

/**
 * Builds traits for values comparable with `===` and printable with `String()`.
 * Either behaviour may be replaced through `overrides`.
 */
export function traits<T>(
    defaultValue: () => T,
    overrides: Partial<Pick<ElementTraits<T>, "equals" | "render">> = {}
): ElementTraits<T> {
    return {
        defaultValue: defaultValue,
        equals: overrides.equals || ((a: T, b: T): boolean => a === b),
        render: overrides.render || ((value: T): string => String(value))
    };
}

export const numberTraits = traits<number>((): number => 0);
export const stringTraits = traits<string>((): string => "");
export const booleanTraits = traits<boolean>((): boolean => false);
