import { IPoint } from "makerjs";
import { isInteger } from "mathjs";
import { check_dimension, nan_max, nan_min } from "../utils/rational_math";

/**
 * An immutable point (or vector) with a fixed number of components.
 *
 * The dimension is carried in the type, so a `PointN<2>` can't be handed to
 * anything expecting a `PointN<3>`.
 */
export class PointN<D extends number> {
    readonly coords: readonly number[];

    constructor(readonly dim: D, coords: Iterable<number>) {
        check_dimension(dim);
        this.coords = Array.from(coords);
        if (this.coords.length !== dim) {
            throw new Error(
                "Expected " + dim + " coordinates, got " + this.coords.length
            );
        }
    }

    static from<D extends number>(dim: D, coords: Iterable<number>): PointN<D> {
        return new PointN(dim, coords);
    }

    static repeat<D extends number>(dim: D, value: number): PointN<D> {
        return new PointN(
            dim,
            Array.from({ length: dim }, () => value)
        );
    }

    static origin<D extends number>(dim: D): PointN<D> {
        return PointN.repeat(dim, 0);
    }

    get length(): D {
        return this.dim;
    }

    get(i: number): number {
        if (!isInteger(i) || i < 0 || i >= this.dim) {
            throw new Error(
                "Index " + i + " out of range for dimension " + this.dim
            );
        }
        return this.coords[i];
    }

    [Symbol.iterator](): Iterator<number> {
        return this.coords[Symbol.iterator]();
    }

    to_array(): number[] {
        return [...this.coords];
    }

    zip_map(
        other: PointN<D>,
        f: (a: number, b: number, i: number) => number
    ): PointN<D> {
        return new PointN(
            this.dim,
            this.coords.map((a, i) => f(a, other.coords[i], i))
        );
    }

    zip_every(
        other: PointN<D>,
        pred: (a: number, b: number, i: number) => boolean
    ): boolean {
        return this.coords.every((a, i) => pred(a, other.coords[i], i));
    }

    add(other: PointN<D>): PointN<D> {
        return this.zip_map(other, (a, b) => a + b);
    }

    sub(other: PointN<D>): PointN<D> {
        return this.zip_map(other, (a, b) => a - b);
    }

    // Both of these drop NaN components in favour of the other side
    min(other: PointN<D>): PointN<D> {
        return this.zip_map(other, nan_min);
    }

    max(other: PointN<D>): PointN<D> {
        return this.zip_map(other, nan_max);
    }

    equals(other: PointN<D>): boolean {
        return this.zip_every(other, (a, b) => a === b);
    }

    to_ipoint(dimm_a: number = 0, dimm_b: number = 1): IPoint {
        return [this.get(dimm_a), this.get(dimm_b)];
    }

    toString(): string {
        return "Point" + this.dim + "(" + this.coords.join(", ") + ")";
    }
}

export type Point1 = PointN<1>;
export type Point2 = PointN<2>;
export type Point3 = PointN<3>;

export const Point1 = {
    new: (x: number): Point1 => new PointN(1, [x]),
};

export const Point2 = {
    new: (x: number, y: number): Point2 => new PointN(2, [x, y]),
};

export const Point3 = {
    new: (x: number, y: number, z: number): Point3 => new PointN(3, [x, y, z]),
};
