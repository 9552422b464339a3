import * as fs from "fs";
import * as path from "path";
import MakerJs, { IModel } from "makerjs";
import { BoundingSpaceN } from "../euclidean/rational_bounds";
import { PointN } from "../euclidean/rational_point";

export function bounds_to_model<D extends number>(
    bounds: BoundingSpaceN<D>,
    dimm_a: number = 0,
    dimm_b: number = 1
): IModel | undefined {
    if (bounds.is_inverted() || !bounds.is_finite()) {
        return undefined;
    }
    const diagonal = bounds.diagonal().to_ipoint(dimm_a, dimm_b);
    return MakerJs.model.move(
        new MakerJs.models.Rectangle(diagonal[0], diagonal[1]),
        bounds.lower.to_ipoint(dimm_a, dimm_b)
    );
}

export function points_to_model<D extends number>(
    points: PointN<D>[],
    radius: number,
    dimm_a: number = 0,
    dimm_b: number = 1
): IModel {
    return new MakerJs.models.Holes(
        radius,
        points.map((p) => p.to_ipoint(dimm_a, dimm_b))
    );
}

export function export_svg(
    name: string,
    model: IModel,
    dir: string = "svg",
    scale_up: number = 100
): string {
    const to_export = MakerJs.model.scale(MakerJs.model.clone(model), scale_up);
    const svg = MakerJs.exporter.toSVG(to_export);
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, name + ".svg");
    fs.writeFileSync(file, svg);
    return file;
}
