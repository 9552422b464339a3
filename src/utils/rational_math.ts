import { isInteger, isNaN, max, min } from "mathjs";

// NaN is an unset bound here: the other operand always wins
export function nan_min(a: number, b: number): number {
    if (isNaN(a)) return b;
    if (isNaN(b)) return a;
    return min(a, b);
}

export function nan_max(a: number, b: number): number {
    if (isNaN(a)) return b;
    if (isNaN(b)) return a;
    return max(a, b);
}

export function check_dimension(dim: number): void {
    if (!isInteger(dim) || dim < 0 || dim > Number.MAX_SAFE_INTEGER) {
        throw new Error("Invalid dimension: " + dim);
    }
}
