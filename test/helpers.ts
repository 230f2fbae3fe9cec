import sharp from "sharp";
import type { Detector } from "../src/engine/detector-engine";
import type { DecodedImage } from "../src/engine/image-context";
import type { ImageBasedRequest } from "../src/requests/image-based-request";
import type { Observation } from "../src/types/observations";

export type Rgb = { r: number; g: number; b: number };

export async function solidImage(width: number, height: number, background: Rgb = { r: 40, g: 90, b: 160 }): Promise<Buffer> {
	return sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();
}

/** Red top half over a blue bottom half. */
export async function splitImage(width: number, height: number): Promise<Buffer> {
	return sharp({ create: { width, height, channels: 3, background: { r: 0, g: 0, b: 255 } } })
		.composite([
			{
				input: { create: { width, height: height / 2, channels: 3, background: { r: 255, g: 0, b: 0 } } },
				top: 0,
				left: 0,
			},
		])
		.png()
		.toBuffer();
}

export function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface DetectorCall {
	image: DecodedImage;
	request: ImageBasedRequest;
}

/** A detector returning fixed observations after `delayMs`, recording its calls. */
export class FakeDetector implements Detector {
	readonly calls: DetectorCall[] = [];
	released = 0;

	constructor(
		private readonly produce: (request: ImageBasedRequest) => Observation[],
		private readonly delayMs = 0,
	) {}

	async detect(image: DecodedImage, request: ImageBasedRequest): Promise<Observation[]> {
		this.calls.push({ image, request });
		await delay(this.delayMs);
		return this.produce(request);
	}

	async release(): Promise<void> {
		this.released++;
	}
}

export class FailingDetector implements Detector {
	constructor(private readonly error: unknown) {}

	async detect(): Promise<Observation[]> {
		throw this.error;
	}
}
