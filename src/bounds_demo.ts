import { IModelMap } from "makerjs";
import { BoundingSpaceN, BoundingSquare } from "./euclidean/rational_bounds";
import { Point2 } from "./euclidean/rational_point";
import {
    bounds_to_model,
    export_svg,
    points_to_model,
} from "./utils/makerjs_tools";

// Drawing parameters
let scale_up = 100;
let hole_radius = 0.05;

const points = [
    Point2.new(0.4, 1.2),
    Point2.new(2.5, -0.3),
    Point2.new(-1.1, 0.8),
    Point2.new(1.7, 2.2),
    Point2.new(0.0, -1.4),
];

const bounds: BoundingSquare = BoundingSpaceN.from_points(2, points);

console.log("\n==== BOUNDS ====");
console.log("Lower    : " + bounds.lower);
console.log("Upper    : " + bounds.upper);
console.log("Diagonal : " + bounds.diagonal());

const models: IModelMap = {
    points: points_to_model(points, hole_radius),
};
const square = bounds_to_model(bounds);
if (square !== undefined) {
    models.bounds = square;
}

console.log("Wrote " + export_svg("bounds", { models }, "svg", scale_up));
