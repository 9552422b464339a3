import { PointN } from "./rational_point";

/**
 * An axis aligned bounding region: an interval, rectangle, box or the
 * N dimensional equivalent, held as its lower and upper corners.
 *
 * Corners are never validated or reordered. A region whose lower corner sits
 * above its upper corner on some axis is "inverted" and is a legitimate
 * state. The supported way to start an empty region is the NaN sentinel:
 *
 * ```ts
 * const bounds = BoundingSpaceN.from_value(3, NaN);
 * points.forEach((p) => bounds.expand(p));
 * ```
 *
 * The first expansion replaces every NaN component with the point's value.
 */
export class BoundingSpaceN<D extends number> {
    constructor(public lower: PointN<D>, public upper: PointN<D>) {}

    static from_point<D extends number>(point: PointN<D>): BoundingSpaceN<D> {
        return new BoundingSpaceN(point, point);
    }

    static from_value<D extends number>(
        dim: D,
        value: number
    ): BoundingSpaceN<D> {
        return BoundingSpaceN.from_values(dim, value, value);
    }

    static from_values<D extends number>(
        dim: D,
        lower: number,
        upper: number
    ): BoundingSpaceN<D> {
        return new BoundingSpaceN(
            PointN.repeat(dim, lower),
            PointN.repeat(dim, upper)
        );
    }

    static default<D extends number>(dim: D): BoundingSpaceN<D> {
        return BoundingSpaceN.from_value(dim, 0);
    }

    // Empty input leaves the NaN sentinel in place
    static from_points<D extends number>(
        dim: D,
        points: Iterable<PointN<D>>
    ): BoundingSpaceN<D> {
        const bounds = BoundingSpaceN.from_value(dim, NaN);
        for (const p of points) {
            bounds.expand(p);
        }
        return bounds;
    }

    get dim(): D {
        return this.lower.dim;
    }

    diagonal(): PointN<D> {
        return this.upper.sub(this.lower);
    }

    contains(point: PointN<D>): boolean {
        for (let i = 0; i < this.dim; i++) {
            if (!(this.lower.coords[i] <= point.coords[i])) {
                return false;
            }
        }

        for (let i = 0; i < this.dim; i++) {
            if (!(this.upper.coords[i] >= point.coords[i])) {
                return false;
            }
        }

        return true;
    }

    is_inverted(): boolean {
        return !this.lower.zip_every(this.upper, (l, u) => l <= u);
    }

    // False for infinite sentinels as well as NaN ones
    is_finite(): boolean {
        return this.lower.zip_every(
            this.upper,
            (l, u) => Number.isFinite(l) && Number.isFinite(u)
        );
    }

    expand_lower(point: PointN<D>) {
        this.lower = point.min(this.lower);
    }

    expand_upper(point: PointN<D>) {
        this.upper = point.max(this.upper);
    }

    expand(point: PointN<D>): this {
        this.expand_lower(point);
        this.expand_upper(point);
        return this;
    }

    clone(): BoundingSpaceN<D> {
        return new BoundingSpaceN(this.lower, this.upper);
    }

    equals(other: BoundingSpaceN<D>): boolean {
        return this.lower.equals(other.lower) && this.upper.equals(other.upper);
    }

    toString(): string {
        return (
            "BoundingSpaceN<" +
            this.dim +
            "> { lower: " +
            this.lower +
            ", upper: " +
            this.upper +
            " }"
        );
    }
}

export type BoundingSpace1 = BoundingSpaceN<1>;
export type BoundingSpace2 = BoundingSpaceN<2>;
export type BoundingSpace3 = BoundingSpaceN<3>;

export type BoundingRange = BoundingSpace1;
export type BoundingSquare = BoundingSpace2;
export type BoundingBox = BoundingSpace3;
