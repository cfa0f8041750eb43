import { DetectionContext, Detector, Evidence, Finding } from './types';
import { DetectorError } from './errors';
import { Logger, noopLogger } from './utils/logger';
import { SignatureStore } from './signatures/signature-store';
import { SignatureDetector } from './detectors/signature-detector';
import { HeuristicDetector } from './detectors/heuristic-detector';
import { BehavioralDetector, IndicatorSource } from './detectors/behavioral-detector';
import { AiModelDetector } from './detectors/ai-model-detector';

export class DetectorRegistry {
  private detectors: Detector[] = [];

  constructor(private readonly logger: Logger = noopLogger) {}

  register(detector: Detector): this {
    this.detectors.push(detector);
    return this;
  }

  getDetectors(): Detector[] {
    return [...this.detectors];
  }

  /**
   * Run every detector on one file. A detector that throws or rejects counts
   * as having found nothing; the others still run. Rejects with the abort
   * reason once `context.signal` fires, whatever the detectors are doing.
   */
  async evaluateAll(evidence: Evidence, context: DetectionContext): Promise<Finding[]> {
    const signal = context.signal;
    if (signal?.aborted) throw signal.reason;

    const all = Promise.all(
      this.detectors.map(async (detector) => {
        try {
          return await detector.evaluate(evidence, context);
        } catch (err) {
          const error = new DetectorError(detector.name, evidence.path, err);
          this.logger.warn(error.message, { detector: detector.method });
          return [];
        }
      }),
    );
    const perDetector = await (signal ? Promise.race([all, rejectOnAbort(signal)]) : all);
    return perDetector.flat();
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export interface DefaultDetectorOptions {
  signatures: SignatureStore;
  indicators?: IndicatorSource;
  logger?: Logger;
}

export function createDefaultRegistry(options: DefaultDetectorOptions): DetectorRegistry {
  return new DetectorRegistry(options.logger)
    .register(new SignatureDetector(options.signatures))
    .register(new HeuristicDetector())
    .register(new BehavioralDetector(options.indicators))
    .register(new AiModelDetector());
}
