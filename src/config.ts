import dotenv from 'dotenv';
import { z } from 'zod';
import { OnnxObjectDetector, faceObservation, humanObservation, rectangleObservation } from './detectors/onnx-object-detector';
import { DetectorEngine } from './engine/detector-engine';
import { InvalidOptionsError } from './errors';
import { DetectFaceRectanglesRequest, DetectHumanRectanglesRequest, DetectRectanglesRequest } from './requests/requests';
import { WebRuntimeProvider } from './runtime/web-provider';
import { OrtSessionManager } from './runtime/session-manager';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const optionalPath = z
  .string()
  .trim()
  .optional()
  .transform(value => (value ? value : undefined));

const ConfigSchema = z.object({
  VISTASK_CAPABILITY_LEVEL: z.coerce.number().int().min(13).default(15),
  VISTASK_FACE_MODEL: optionalPath,
  VISTASK_HUMAN_MODEL: optionalPath,
  VISTASK_RECTANGLE_MODEL: optionalPath,
  VISTASK_TARGET_SIZE: z.coerce.number().int().positive().default(384),
  VISTASK_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.2),
  VISTASK_IOU_THRESHOLD: z.coerce.number().min(0).max(1).default(0.45),
  VISTASK_DEBUG: booleanFlag,
});

export interface VistaskConfig {
  capabilityLevel: number;
  models: {
    face?: string;
    human?: string;
    rectangle?: string;
  };
  targetSize: [number, number];
  confidenceThreshold: number;
  iouThreshold: number;
  debug: boolean;
}

/**
 * Reads settings from `env`, or from `process.env` after loading `.env`.
 */
export function loadConfig(env?: Record<string, string | undefined>): VistaskConfig {
  if (!env) {
    dotenv.config();
  }
  const parsed = ConfigSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidOptionsError(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    capabilityLevel: values.VISTASK_CAPABILITY_LEVEL,
    models: {
      face: values.VISTASK_FACE_MODEL,
      human: values.VISTASK_HUMAN_MODEL,
      rectangle: values.VISTASK_RECTANGLE_MODEL,
    },
    targetSize: [values.VISTASK_TARGET_SIZE, values.VISTASK_TARGET_SIZE],
    confidenceThreshold: values.VISTASK_CONFIDENCE_THRESHOLD,
    iouThreshold: values.VISTASK_IOU_THRESHOLD,
    debug: values.VISTASK_DEBUG,
  };
}

/**
 * A `DetectorEngine` with an ONNX detector registered for every configured
 * model. Request types without a model stay unsupported.
 */
export function createDefaultEngine(
  config: VistaskConfig = loadConfig(),
  sessions: OrtSessionManager = new OrtSessionManager(new WebRuntimeProvider()),
): DetectorEngine {
  const engine = new DetectorEngine({ capabilityLevel: config.capabilityLevel });
  const detection = {
    targetSize: config.targetSize,
    confidenceThreshold: config.confidenceThreshold,
    iouThreshold: config.iouThreshold,
  };

  if (config.models.face) {
    engine.register(DetectFaceRectanglesRequest, new OnnxObjectDetector(sessions, config.models.face, faceObservation, detection));
  }
  if (config.models.human) {
    engine.register(DetectHumanRectanglesRequest, new OnnxObjectDetector(sessions, config.models.human, humanObservation, detection));
  }
  if (config.models.rectangle) {
    engine.register(DetectRectanglesRequest, new OnnxObjectDetector(sessions, config.models.rectangle, rectangleObservation, detection));
  }

  return engine;
}
