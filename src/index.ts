import sharp from "sharp";
import { createDefaultEngine, loadConfig } from "./config";
import type { ImageAnalysisEngine } from "./engine/image-analysis-engine";
import { sharedImageContext, type ImageContext } from "./engine/image-context";
import { InvalidOptionsError } from "./errors";
import { ProcessingState } from "./processing-state";
import type { SegmentationQualityLevel } from "./requests/requests";
import { buildRequest } from "./tasks/request-builder";
import { VisionTask, type SaliencyMode } from "./tasks/vision-task";
import type { ImageInput, PerformOptions, TaskResult } from "./types";
import type { NormalizedRect } from "./types/geometry";
import {
	ContoursObservation,
	FaceObservation,
	HorizonObservation,
	HumanBodyPoseObservation,
	HumanObservation,
	PixelBufferObservation,
	RectangleObservation,
	SaliencyImageObservation,
	type Observation,
	type ObservationType,
} from "./types/observations";
import { CompletionJoin } from "./utils/join";
import { asMany, asOne } from "./utils/projection";
import { validatePerformOptions } from "./validation";

export interface VistaskOptions {
	/** Logs batch start and end through `console.debug`. */
	debug?: boolean;
	/** Share one flag between several instances. */
	processingState?: ProcessingState;
}

type ConvenienceOptions = Omit<PerformOptions, "preferBackgroundProcessing">;

class TaskBuilder {
	private image?: ImageInput;
	private options: PerformOptions = {};

	constructor(
		private readonly tasks: readonly VisionTask[],
		private readonly vistask: Vistask,
	) {}

	in(image: ImageInput): TaskBuilder {
		this.image = image;
		return this;
	}

	withOptions(options: PerformOptions): TaskBuilder {
		this.options = { ...this.options, ...options };
		return this;
	}

	withRegionOfInterest(regionOfInterest: NormalizedRect): TaskBuilder {
		this.options.regionOfInterest = regionOfInterest;
		return this;
	}

	withRevision(revision: number): TaskBuilder {
		this.options.revision = revision;
		return this;
	}

	preferringBackground(): TaskBuilder {
		this.options.preferBackgroundProcessing = true;
		return this;
	}

	withImageContext(imageContext: ImageContext): TaskBuilder {
		this.options.imageContext = imageContext;
		return this;
	}

	async now(): Promise<TaskResult[]> {
		if (this.image === undefined) {
			throw new InvalidOptionsError("No image provided. Call in() first.");
		}
		return this.vistask.performTasks(this.tasks, this.image, this.options);
	}
}

/**
 * Runs analysis tasks against an image on an `ImageAnalysisEngine` and hands
 * back one typed result per task.
 */
export default class Vistask {
	private static sharedInstance?: Vistask;

	readonly processing: ProcessingState;
	private readonly debug: boolean;

	constructor(
		readonly engine: ImageAnalysisEngine,
		options: VistaskOptions = {},
	) {
		this.processing = options.processingState ?? new ProcessingState();
		this.debug = options.debug ?? false;
	}

	/** Process-wide instance over the engine described by the environment. */
	static get shared(): Vistask {
		if (!Vistask.sharedInstance) {
			const config = loadConfig();
			Vistask.sharedInstance = new Vistask(createDefaultEngine(config), { debug: config.debug });
		}
		return Vistask.sharedInstance;
	}

	get isProcessing(): boolean {
		return this.processing.isProcessing;
	}

	get capabilityLevel(): number {
		return this.engine.capabilityLevel;
	}

	/** Task factories gated on this engine's capability level. */
	get task() {
		const level = this.capabilityLevel;
		return {
			contourDetection: () => VisionTask.contourDetection(level),
			humanBodyPoseDetection: () => VisionTask.humanBodyPoseDetection(level),
			humanRectanglesDetection: (upperBodyOnly = true) => VisionTask.humanRectanglesDetection(level, upperBodyOnly),
			personSegmentation: (qualityLevel: SegmentationQualityLevel = "balanced") =>
				VisionTask.personSegmentation(level, qualityLevel),
			documentSegmentation: () => VisionTask.documentSegmentation(level),
		};
	}

	tasks(...tasks: VisionTask[]): TaskBuilder {
		return new TaskBuilder(tasks, this);
	}

	/**
	 * Runs every task against `image` as one batch. Results come back in the
	 * order the engine completes them; `TaskResult.index` points at the task.
	 * A submission failure rejects with the engine's error and no results.
	 */
	async performTasks(tasks: readonly VisionTask[], image: ImageInput, options: PerformOptions = {}): Promise<TaskResult[]> {
		const requestOptions = validatePerformOptions(options);
		const context = options.imageContext ?? sharedImageContext;

		return this.processing.track(async () => {
			const startedAt = Date.now();
			this.log(`performing ${tasks.map((task) => task.key).join(", ") || "no tasks"}`);

			const join = new CompletionJoin(tasks);
			const requests = tasks.map((task, index) => {
				const request = buildRequest(task, requestOptions, (completed, error) => join.record(index, completed, error));
				join.track(index, request);
				return request;
			});

			try {
				await this.engine.perform(image, requests, context);
			} catch (error) {
				this.log(`batch failed after ${Date.now() - startedAt}ms`);
				throw error;
			}

			const results = join.settle();
			this.log(`batch finished in ${Date.now() - startedAt}ms, ${results.filter((r) => r.error).length} failed`);
			return results;
		});
	}

	async performTask(task: VisionTask, image: ImageInput, options: PerformOptions = {}): Promise<TaskResult> {
		const [result] = await this.performTasks([task], image, options);
		return result;
	}

	/** Runs the tasks once on a small solid image so later calls start warm. */
	async warmup(tasks: readonly VisionTask[]): Promise<void> {
		try {
			const image = await sharp({
				create: { width: 64, height: 64, channels: 3, background: { r: 255, g: 0, b: 0 } },
			})
				.png()
				.toBuffer();
			await this.performTasks(tasks, image);
			this.log("warmed up");
		} catch (error) {
			console.warn("[vistask] Warmup failed:", error);
		}
	}

	async horizonDetection(image: ImageInput, options?: ConvenienceOptions): Promise<HorizonObservation> {
		return this.single(VisionTask.horizonDetection, HorizonObservation, image, options);
	}

	async saliencyAnalysis(mode: SaliencyMode, image: ImageInput, options?: ConvenienceOptions): Promise<SaliencyImageObservation[]> {
		return this.multiple(VisionTask.saliency(mode), SaliencyImageObservation, image, options);
	}

	async salientObjects(mode: SaliencyMode, image: ImageInput, options?: ConvenienceOptions): Promise<RectangleObservation[]> {
		const saliency = await this.saliencyAnalysis(mode, image, options);
		return saliency.flatMap((observation) => observation.salientObjects);
	}

	async faceDetection(image: ImageInput, options?: ConvenienceOptions): Promise<FaceObservation[]> {
		return this.multiple(VisionTask.faceDetection, FaceObservation, image, options);
	}

	async faceLandmarkDetection(image: ImageInput, options?: ConvenienceOptions): Promise<FaceObservation[]> {
		return this.multiple(VisionTask.faceLandmarkDetection, FaceObservation, image, options);
	}

	async faceCaptureQualityDetection(image: ImageInput, options?: ConvenienceOptions): Promise<FaceObservation[]> {
		return this.multiple(VisionTask.faceCaptureQuality, FaceObservation, image, options);
	}

	async rectangleDetection(image: ImageInput, options?: ConvenienceOptions): Promise<RectangleObservation[]> {
		return this.multiple(VisionTask.rectangleDetection, RectangleObservation, image, options);
	}

	async humanRectanglesDetection(
		image: ImageInput,
		options?: ConvenienceOptions & { upperBodyOnly?: boolean },
	): Promise<HumanObservation[]> {
		return this.multiple(this.task.humanRectanglesDetection(options?.upperBodyOnly), HumanObservation, image, options);
	}

	async personSegmentation(
		image: ImageInput,
		qualityLevel: SegmentationQualityLevel,
		options?: ConvenienceOptions,
	): Promise<PixelBufferObservation[]> {
		return this.multiple(this.task.personSegmentation(qualityLevel), PixelBufferObservation, image, options);
	}

	async documentSegmentation(image: ImageInput, options?: ConvenienceOptions): Promise<RectangleObservation[]> {
		return this.multiple(this.task.documentSegmentation(), RectangleObservation, image, options);
	}

	async contourDetection(image: ImageInput, options?: ConvenienceOptions): Promise<ContoursObservation[]> {
		return this.multiple(this.task.contourDetection(), ContoursObservation, image, options);
	}

	async humanBodyPoseDetection(image: ImageInput, options?: ConvenienceOptions): Promise<HumanBodyPoseObservation[]> {
		return this.multiple(this.task.humanBodyPoseDetection(), HumanBodyPoseObservation, image, options);
	}

	private async single<T extends Observation>(
		task: VisionTask,
		type: ObservationType<T>,
		image: ImageInput,
		options?: ConvenienceOptions,
	): Promise<T> {
		return asOne(await this.performTask(task, image, options), type);
	}

	private async multiple<T extends Observation>(
		task: VisionTask,
		type: ObservationType<T>,
		image: ImageInput,
		options?: ConvenienceOptions,
	): Promise<T[]> {
		return asMany(await this.performTask(task, image, options), type);
	}

	private log(message: string): void {
		if (this.debug) {
			console.debug(`[vistask] ${message}`);
		}
	}
}

export { TaskBuilder };
export { loadConfig, createDefaultEngine, type VistaskConfig } from "./config";
export { DetectorEngine, type Detector, type DetectorEngineOptions } from "./engine/detector-engine";
export type { ImageAnalysisEngine } from "./engine/image-analysis-engine";
export { ImageContext, sharedImageContext, type DecodedImage, type ImageContextOptions } from "./engine/image-context";
export * from "./errors";
export { ProcessingState, type ProcessingListener } from "./processing-state";
export * from "./requests/image-based-request";
export * from "./requests/requests";
export { OnnxObjectDetector, faceObservation, humanObservation, rectangleObservation, type ObservationFactory } from "./detectors/onnx-object-detector";
export { OrtSessionManager, type OrtSessionManagerOptions } from "./runtime/session-manager";
export { WebRuntimeProvider } from "./runtime/web-provider";
export { buildRequest, type RequestOptions } from "./tasks/request-builder";
export { resolveObservationType, resolveRequestType } from "./tasks/resolver";
export * from "./tasks/vision-task";
export type { DetectionOptions, ImageInput, PerformOptions, TaskResult } from "./types";
export * from "./types/geometry";
export * from "./types/observations";
export type { RuntimeProvider, RuntimeSession, RuntimeTensor } from "./types/runtime";
export { asMany, asOne, isObservationOf } from "./utils/projection";
export { buildOverlaySvg, drawObservations, renderMask, renderObservations, type DrawOptions } from "./utils/draw";
export * from "./utils/geometry";
