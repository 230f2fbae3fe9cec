import { describe, expect, it } from "vitest";
import { NoObservationsError } from "../src/errors";
import { DetectFaceRectanglesRequest } from "../src/requests/requests";
import { VisionTask } from "../src/tasks/vision-task";
import type { TaskResult } from "../src/types";
import {
	DetectedObjectObservation,
	FaceObservation,
	HorizonObservation,
	type Observation,
} from "../src/types/observations";
import { asMany, asOne, isObservationOf } from "../src/utils/projection";

const box = { x: 0.1, y: 0.2, width: 0.3, height: 0.4 };

function result(observations: Observation[], error?: Error): TaskResult {
	return { task: VisionTask.faceDetection, index: 0, request: new DetectFaceRectanglesRequest(), observations, error };
}

describe("isObservationOf", () => {
	it("matches subclasses", () => {
		const face = new FaceObservation({ boundingBox: box });
		expect(isObservationOf(face, FaceObservation)).toBe(true);
		expect(isObservationOf(face, DetectedObjectObservation)).toBe(true);
		expect(isObservationOf(face, HorizonObservation)).toBe(false);
	});
});

describe("asMany", () => {
	it("keeps matching observations in order", () => {
		const first = new FaceObservation({ boundingBox: box, confidence: 0.9 });
		const second = new FaceObservation({ boundingBox: box, confidence: 0.4 });
		expect(asMany(result([first, new HorizonObservation({ angle: 0 }), second]), FaceObservation)).toEqual([first, second]);
	});

	it("returns an empty list when nothing matches", () => {
		expect(asMany(result([]), FaceObservation)).toEqual([]);
		expect(asMany(result([new HorizonObservation({ angle: 0 })]), FaceObservation)).toEqual([]);
	});

	it("rethrows the task error", () => {
		const error = new Error("detector failed");
		expect(() => asMany(result([], error), FaceObservation)).toThrow(error);
	});
});

describe("asOne", () => {
	it("returns the first observation", () => {
		const first = new FaceObservation({ boundingBox: box });
		expect(asOne(result([first, new FaceObservation({ boundingBox: box })]), FaceObservation)).toBe(first);
	});

	it("throws when there are no observations", () => {
		expect(() => asOne(result([]), FaceObservation)).toThrow(NoObservationsError);
		expect(() => asOne(result([]), FaceObservation)).toThrow("DetectFaceRectanglesRequest produced no observations");
	});

	it("throws when the first observation has another type", () => {
		expect(() => asOne(result([new HorizonObservation({ angle: 0 })]), FaceObservation)).toThrow(
			"DetectFaceRectanglesRequest produced HorizonObservation, expected FaceObservation",
		);
	});

	it("prefers the task error", () => {
		const error = new Error("detector failed");
		expect(() => asOne(result([new FaceObservation({ boundingBox: box })], error), FaceObservation)).toThrow(error);
	});
});
