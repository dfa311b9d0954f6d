/**
 * Anything with a canonical text form. Every value except null and undefined qualifies.
 */
export type Display = {
    toString(): string;
};

export type Option<T> = T | null | undefined;

export type ResultOk<T> = {
    ok: true;
    value: T;
};

export type ResultErr<E> = {
    ok: false;
    error: E;
};

export type Result<T, E> = ResultOk<T> | ResultErr<E>;

export function resultOk<T>(value: T): ResultOk<T> {
    return { ok: true, value };
}

export function resultErr<E>(error: E): ResultErr<E> {
    return { ok: false, error };
}
