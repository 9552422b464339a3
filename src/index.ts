export { BoundingSpaceN } from "./euclidean/rational_bounds";
export type {
    BoundingSpace1,
    BoundingSpace2,
    BoundingSpace3,
    BoundingRange,
    BoundingSquare,
    BoundingBox,
} from "./euclidean/rational_bounds";
export { PointN, Point1, Point2, Point3 } from "./euclidean/rational_point";
export { nan_min, nan_max, check_dimension } from "./utils/rational_math";
export {
    bounds_to_model,
    points_to_model,
    export_svg,
} from "./utils/makerjs_tools";
