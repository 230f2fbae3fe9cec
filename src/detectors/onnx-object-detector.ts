import type { Detector } from '../engine/detector-engine';
import type { DecodedImage, ImageContext } from '../engine/image-context';
import type { ImageBasedRequest } from '../requests/image-based-request';
import { DetectHumanRectanglesRequest } from '../requests/requests';
import type { OrtSessionManager } from '../runtime/session-manager';
import type { DetectionOptions } from '../types';
import {
  FaceObservation,
  HumanObservation,
  RectangleObservation,
  type Observation,
} from '../types/observations';
import type { RuntimeSession, RuntimeTensor } from '../types/runtime';
import { normalizeDetections, postprocessDetection, type NormalizedDetection } from '../utils/postprocessing/detection';
import { imageToTensor } from '../utils/preprocessing/imagePreprocess';

export type ObservationFactory = (detection: NormalizedDetection, request: ImageBasedRequest) => Observation;

export const faceObservation: ObservationFactory = ({ boundingBox, confidence }) =>
  new FaceObservation({ boundingBox, confidence });

export const humanObservation: ObservationFactory = ({ boundingBox, confidence }, request) =>
  new HumanObservation({
    boundingBox,
    confidence,
    upperBodyOnly: request instanceof DetectHumanRectanglesRequest ? request.upperBodyOnly : true,
  });

export const rectangleObservation: ObservationFactory = ({ boundingBox, confidence }) =>
  RectangleObservation.fromBoundingBox(boundingBox, confidence);

/**
 * Backs box-shaped requests with a YOLO-style ONNX model whose output is
 * `[1, 4 + classes, predictions]`.
 */
export class OnnxObjectDetector<S extends RuntimeSession = RuntimeSession, T extends RuntimeTensor = RuntimeTensor>
  implements Detector
{
  private readonly options: Required<Omit<DetectionOptions, 'classes'>> & Pick<DetectionOptions, 'classes'>;

  constructor(
    private readonly sessions: OrtSessionManager<S, T>,
    private readonly modelPath: string,
    private readonly createObservation: ObservationFactory,
    options: DetectionOptions = {},
  ) {
    this.options = {
      iouThreshold: options.iouThreshold ?? 0.45,
      confidenceThreshold: options.confidenceThreshold ?? 0.2,
      targetSize: options.targetSize ?? [384, 384],
      inputShape: options.inputShape ?? 'NCHW',
      classes: options.classes,
    };
  }

  async detect(image: DecodedImage, request: ImageBasedRequest, context: ImageContext): Promise<Observation[]> {
    const { targetSize, inputShape, confidenceThreshold, iouThreshold, classes } = this.options;
    const [targetWidth, targetHeight] = targetSize;

    const session = await this.sessions.get(this.modelPath);
    const input = await imageToTensor(image, context, targetSize, inputShape);
    const dims = inputShape === 'NHWC' ? [1, targetHeight, targetWidth, 3] : [1, 3, targetHeight, targetWidth];
    const tensor = this.sessions.createTensor(input, dims);

    try {
      const results = await this.sessions.run(session, { [session.inputNames[0]]: tensor });
      const output = results[session.outputNames[0]];
      try {
        if (!output || !(output.data instanceof Float32Array) || output.dims.length !== 3) {
          throw new Error(`Unexpected output from ${this.modelPath}`);
        }
        const [, channels, numPredictions] = output.dims;
        const boxes = postprocessDetection(output.data, confidenceThreshold, iouThreshold, numPredictions, channels, classes);
        return normalizeDetections(boxes, targetSize).map(detection => this.createObservation(detection, request));
      } finally {
        for (const resultTensor of Object.values(results)) {
          resultTensor.dispose?.();
        }
      }
    } finally {
      tensor.dispose?.();
    }
  }

  async release(): Promise<void> {
    await this.sessions.release(this.modelPath);
  }
}
