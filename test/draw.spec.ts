import sharp from "sharp";
import { describe, expect, it } from "vitest";
import {
	ContoursObservation,
	FaceObservation,
	HorizonObservation,
	HumanBodyPoseObservation,
	PixelBufferObservation,
	RectangleObservation,
	SaliencyImageObservation,
} from "../src/types/observations";
import { buildOverlaySvg, generateColorPalette, renderMask, renderObservations } from "../src/utils/draw";
import {
	cropRectForRegion,
	flipPoint,
	flipRect,
	imageRectForNormalizedRect,
	pointsInImage,
} from "../src/utils/geometry";
import { solidImage } from "./helpers";

const size = { width: 200, height: 100 };
const box = { x: 0.25, y: 0.5, width: 0.5, height: 0.25 };

function lines(svg: string): string[] {
	return svg.split("\n").map((line) => line.trim());
}

describe("geometry", () => {
	it("scales normalized rects into pixels", () => {
		const rect = imageRectForNormalizedRect(box, 200, 100);
		expect(rect).toEqual({ x: 50, y: 50, width: 100, height: 25 });
		expect(flipRect(rect, 100)).toEqual({ x: 50, y: 25, width: 100, height: 25 });
	});

	it("flips points", () => {
		expect(flipPoint({ x: 10, y: 20 }, 100)).toEqual({ x: 10, y: 80 });
	});

	it("maps box-relative points into the image", () => {
		expect(pointsInImage([{ x: 0.5, y: 0.5 }], { x: 0.25, y: 0.25, width: 0.5, height: 0.5 }, { width: 80, height: 80 })).toEqual([
			{ x: 40, y: 40 },
		]);
	});

	it("computes top-left crop rects", () => {
		expect(cropRectForRegion({ x: 0, y: 0.5, width: 0.5, height: 0.5 }, { width: 100, height: 50 })).toEqual({
			x: 0,
			y: 0,
			width: 50,
			height: 25,
		});
	});

	it("keeps crops at least one pixel inside the image", () => {
		expect(cropRectForRegion({ x: 0.9, y: 0, width: 0.1, height: 0.1 }, { width: 10, height: 10 })).toEqual({
			x: 9,
			y: 9,
			width: 1,
			height: 1,
		});
		expect(cropRectForRegion({ x: 0.5, y: 0.5, width: 0.01, height: 0.01 }, { width: 10, height: 10 })).toEqual({
			x: 5,
			y: 5,
			width: 1,
			height: 1,
		});
	});
});

describe("buildOverlaySvg", () => {
	it("draws bounding boxes on a top-left surface", () => {
		const svg = buildOverlaySvg([new FaceObservation({ boundingBox: box })], size, { color: "red" });
		expect(svg.startsWith('<svg width="200" height="100"')).toBe(true);
		expect(lines(svg)).toContain(
			'<rect x="50" y="25" width="100" height="25" rx="4" ry="4" class="bounding-box" stroke="red" />',
		);
	});

	it("keeps the lower-left origin when not flipped", () => {
		const svg = buildOverlaySvg([new FaceObservation({ boundingBox: box })], size, { color: "red", flipped: false });
		expect(lines(svg)).toContain(
			'<rect x="50" y="50" width="100" height="25" rx="4" ry="4" class="bounding-box" stroke="red" />',
		);
	});

	it("labels confidence", () => {
		const svg = buildOverlaySvg([new FaceObservation({ boundingBox: box, confidence: 0.87 })], size, {
			color: "red",
			showConfidence: true,
		});
		expect(lines(svg)).toContain(
			'<rect x="50" y="10" width="38.5" height="24" rx="12" ry="12" class="label-background" fill="red" />',
		);
		expect(lines(svg)).toContain('<text x="58" y="27" class="label-text">87%</text>');
	});

	it("draws rectangles as quads", () => {
		const svg = buildOverlaySvg([RectangleObservation.fromBoundingBox(box)], size, { color: "red" });
		expect(lines(svg)).toContain('<polygon points="50,25 150,25 150,50 50,50" class="quad" stroke="red" />');
	});

	it("draws selected face landmarks", () => {
		const face = new FaceObservation({
			boundingBox: box,
			landmarks: {
				outerLips: {
					points: [
						{ x: 0, y: 0 },
						{ x: 1, y: 0 },
						{ x: 1, y: 1 },
					],
					pointsClassification: "closedPath",
				},
				leftPupil: { points: [{ x: 0, y: 0 }], pointsClassification: "disconnected" },
			},
		});

		const all = lines(buildOverlaySvg([face], size, { color: "red" }));
		expect(all).toContain('<polygon points="50,50 150,50 150,25" class="landmark-path" stroke="red" />');
		expect(all).toContain('<circle cx="50" cy="50" r="2" class="landmark-point" fill="red" />');

		const lipsOnly = lines(buildOverlaySvg([face], size, { color: "red", landmarks: ["outerLips"] }));
		expect(lipsOnly.filter((line) => line.startsWith("<circle"))).toEqual([]);
	});

	it("draws nested contours", () => {
		const contours = new ContoursObservation({
			contours: [
				{
					points: [
						{ x: 0, y: 0 },
						{ x: 1, y: 0 },
						{ x: 1, y: 1 },
					],
					children: [{ points: [{ x: 0.5, y: 0.5 }], children: [] }],
				},
			],
		});
		const svg = lines(buildOverlaySvg([contours], size, { color: "red" }));
		expect(svg).toContain('<polygon points="0,100 200,100 200,0" class="contour" stroke="red" />');
		expect(svg).toContain('<polygon points="100,50" class="contour" stroke="red" />');
	});

	it("skips low-confidence joints", () => {
		const pose = new HumanBodyPoseObservation({
			recognizedPoints: {
				nose: { x: 0.5, y: 0.5, confidence: 0.9 },
				leftEye: { x: 0.4, y: 0.6, confidence: 0.05 },
			},
		});
		const joints = lines(buildOverlaySvg([pose], size, { color: "red" })).filter((line) => line.includes('class="joint"'));
		expect(joints).toEqual(['<circle cx="100" cy="50" r="4" class="joint" fill="red" />']);
	});

	it("draws the horizon across the surface", () => {
		const svg = buildOverlaySvg([new HorizonObservation({ angle: 0 })], size, { color: "red" });
		expect(lines(svg)).toContain('<line x1="-100" y1="50" x2="300" y2="50" class="horizon" stroke="red" />');
	});

	it("draws salient objects as quads", () => {
		const saliency = new SaliencyImageObservation({
			mask: { width: 1, height: 1, data: new Float32Array([1]) },
			salientObjects: [RectangleObservation.fromBoundingBox(box)],
		});
		const svg = buildOverlaySvg([saliency], size, { color: "red" });
		expect(lines(svg)).toContain('<polygon points="50,25 150,25 150,50 50,50" class="quad" stroke="red" />');
	});

	it("colors observations from the palette", () => {
		const svg = buildOverlaySvg(
			[new FaceObservation({ boundingBox: box }), new FaceObservation({ boundingBox: box })],
			size,
		);
		expect(svg).toContain('stroke="hsl(0, 80%, 55%)"');
		expect(svg).toContain('stroke="hsl(137.51, 80%, 55%)"');
	});
});

describe("generateColorPalette", () => {
	it("spreads hues by the golden angle", () => {
		expect(generateColorPalette(2)).toEqual(["hsl(0, 80%, 55%)", "hsl(137.51, 80%, 55%)"]);
	});
});

describe("renderObservations", () => {
	it("returns a PNG the size of the input", async () => {
		const png = await renderObservations(await solidImage(200, 100), [new FaceObservation({ boundingBox: box })]);
		const { width, height, format } = await sharp(png).metadata();
		expect([width, height, format]).toEqual([200, 100, "png"]);
	});
});

describe("renderMask", () => {
	const red = { r: 255, g: 0, b: 0 };

	async function pixels(png: Buffer): Promise<{ data: Buffer; channels: number }> {
		const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
		return { data, channels: info.channels };
	}

	it("tints float masks with the mask opacity", async () => {
		const mask = { width: 2, height: 1, data: new Float32Array([1, 0]) };
		const { data, channels } = await pixels(await renderMask(mask, { width: 2, height: 1 }, { maskColor: red }));

		expect(channels).toBe(4);
		expect([data[0], data[1], data[2], data[3]]).toEqual([255, 0, 0, 128]);
		expect(data[7]).toBe(0);
	});

	it("reads byte masks on a 0 to 255 scale", async () => {
		const mask = { width: 2, height: 1, data: new Uint8Array([255, 51]) };
		const { data } = await pixels(await renderMask(mask, { width: 2, height: 1 }, { maskColor: red, maskOpacity: 1 }));
		expect([data[3], data[7]]).toEqual([255, 51]);
	});

	it("flips rows for lower-left surfaces", async () => {
		const mask = { width: 1, height: 2, data: new Uint8Array([255, 0]) };
		const { data } = await pixels(
			await renderMask(mask, { width: 1, height: 2 }, { maskColor: red, maskOpacity: 1, flipped: false }),
		);
		expect([data[3], data[7]]).toEqual([0, 255]);
	});

	it("stretches the mask to the surface", async () => {
		const mask = { width: 1, height: 1, data: new Float32Array([1]) };
		const { width, height } = await sharp(await renderMask(mask, { width: 4, height: 2 })).metadata();
		expect([width, height]).toEqual([4, 2]);
	});

	it("is composited by renderObservations", async () => {
		const mask = { width: 4, height: 4, data: new Float32Array(16).fill(1) };
		const png = await renderObservations(
			await solidImage(4, 4, { r: 0, g: 0, b: 0 }),
			[new PixelBufferObservation({ mask })],
			{ maskColor: red, maskOpacity: 1 },
		);

		const data = await sharp(png).removeAlpha().raw().toBuffer();
		expect([data[0], data[1], data[2]]).toEqual([255, 0, 0]);
	});
});
