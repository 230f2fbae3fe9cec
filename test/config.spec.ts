import { describe, expect, it } from "vitest";
import { createDefaultEngine, loadConfig } from "../src/config";
import { InvalidOptionsError } from "../src/errors";
import { DetectFaceRectanglesRequest, DetectHumanRectanglesRequest, DetectRectanglesRequest } from "../src/requests/requests";
import { OrtSessionManager } from "../src/runtime/session-manager";
import type { RuntimeProvider } from "../src/types/runtime";

const provider: RuntimeProvider = {
	createSession: async () => ({ inputNames: ["images"], outputNames: ["output0"] }),
	createTensor: (_type, data, dims) => ({ data, dims }),
	run: async () => ({}),
	release: async () => {},
};

describe("loadConfig", () => {
	it("applies defaults", () => {
		expect(loadConfig({})).toEqual({
			capabilityLevel: 15,
			models: { face: undefined, human: undefined, rectangle: undefined },
			targetSize: [384, 384],
			confidenceThreshold: 0.2,
			iouThreshold: 0.45,
			debug: false,
		});
	});

	it("reads values from the environment", () => {
		const config = loadConfig({
			VISTASK_CAPABILITY_LEVEL: "14",
			VISTASK_FACE_MODEL: " models/face.onnx ",
			VISTASK_HUMAN_MODEL: "  ",
			VISTASK_TARGET_SIZE: "640",
			VISTASK_CONFIDENCE_THRESHOLD: "0.5",
			VISTASK_DEBUG: "1",
		});

		expect(config.capabilityLevel).toBe(14);
		expect(config.models).toEqual({ face: "models/face.onnx", human: undefined, rectangle: undefined });
		expect(config.targetSize).toEqual([640, 640]);
		expect(config.confidenceThreshold).toBe(0.5);
		expect(config.debug).toBe(true);
	});

	it("rejects invalid values", () => {
		expect(() => loadConfig({ VISTASK_CAPABILITY_LEVEL: "12" })).toThrow(InvalidOptionsError);
		expect(() => loadConfig({ VISTASK_CAPABILITY_LEVEL: "12" })).toThrow("Invalid configuration: VISTASK_CAPABILITY_LEVEL");
		expect(() => loadConfig({ VISTASK_DEBUG: "yes" })).toThrow("Invalid configuration: VISTASK_DEBUG");
		expect(() => loadConfig({ VISTASK_IOU_THRESHOLD: "2" })).toThrow("Invalid configuration: VISTASK_IOU_THRESHOLD");
	});
});

describe("createDefaultEngine", () => {
	it("registers a detector per configured model", () => {
		const config = loadConfig({ VISTASK_FACE_MODEL: "face.onnx", VISTASK_RECTANGLE_MODEL: "rectangles.onnx" });
		const engine = createDefaultEngine(config, new OrtSessionManager(provider));

		expect(engine.capabilityLevel).toBe(15);
		expect(engine.supports(DetectFaceRectanglesRequest)).toBe(true);
		expect(engine.supports(DetectRectanglesRequest)).toBe(true);
		expect(engine.supports(DetectHumanRectanglesRequest)).toBe(false);
	});

	it("registers nothing without models", () => {
		const engine = createDefaultEngine(loadConfig({ VISTASK_CAPABILITY_LEVEL: "13" }), new OrtSessionManager(provider));
		expect(engine.capabilityLevel).toBe(13);
		expect(engine.supports(DetectFaceRectanglesRequest)).toBe(false);
	});
});
